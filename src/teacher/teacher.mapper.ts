import { Teacher } from './entities/teacher.entity';
import { fullName } from '../user/entities/user.entity';
import { UserSummary, toUserSummary } from '../user/user.mapper';
import { SubjectSummary, toSubjectSummary } from '../subject/subject.mapper';
import { loaded } from '../common/utils/relations';

export interface TeacherListItem {
  id: string;
  name: string;
  email: string | null;
  employeeId: string;
  department: string;
  specialization: string | null;
}

export interface TeacherDetail {
  id: string;
  user: UserSummary;
  employeeId: string;
  department: string;
  qualification: string;
  experienceYears: number;
  specialization: string | null;
  subjects: SubjectSummary[];
  hireDate: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export function toTeacherListItem(teacher: Teacher): TeacherListItem {
  const user = loaded(teacher.user, 'teacher.user');
  return {
    id: teacher.id,
    name: fullName(user),
    email: user.email,
    employeeId: teacher.employeeId,
    department: teacher.department,
    specialization: teacher.specialization,
  };
}

export function toTeacherDetail(teacher: Teacher): TeacherDetail {
  return {
    id: teacher.id,
    user: toUserSummary(loaded(teacher.user, 'teacher.user')),
    employeeId: teacher.employeeId,
    department: teacher.department,
    qualification: teacher.qualification,
    experienceYears: teacher.experienceYears,
    specialization: teacher.specialization,
    subjects: (teacher.subjects ?? []).map(toSubjectSummary),
    hireDate: teacher.hireDate,
    isActive: teacher.isActive,
    createdAt: teacher.createdAt,
    updatedAt: teacher.updatedAt,
  };
}
