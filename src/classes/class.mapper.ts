import { Class } from './entity/class.entity';
import { TeacherListItem, toTeacherListItem } from '../teacher/teacher.mapper';
import { SubjectSummary, toSubjectSummary } from '../subject/subject.mapper';

export interface ClassSummary {
  id: string;
  name: string;
  gradeLevel: string;
  section: string;
  academicYear: string;
}

export interface ClassDetail extends ClassSummary {
  teacher: TeacherListItem | null;
  subjects: SubjectSummary[];
  roomNumber: string | null;
  maxStudents: number;
  studentCount: number;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export function toClassSummary(klass: Class): ClassSummary {
  return {
    id: klass.id,
    name: klass.name,
    gradeLevel: klass.gradeLevel,
    section: klass.section,
    academicYear: klass.academicYear,
  };
}

export function toClassDetail(klass: Class): ClassDetail {
  return {
    ...toClassSummary(klass),
    teacher: klass.teacher ? toTeacherListItem(klass.teacher) : null,
    subjects: (klass.subjects ?? []).map(toSubjectSummary),
    roomNumber: klass.roomNumber,
    maxStudents: klass.maxStudents,
    studentCount: klass.studentCount ?? 0,
    isActive: klass.isActive,
    createdAt: klass.createdAt,
    updatedAt: klass.updatedAt,
  };
}
