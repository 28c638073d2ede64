import { Assignment, AssignmentType, ASSIGNMENT_TYPE_DISPLAY } from './entities/assignment.entity';
import { SubjectSummary, toSubjectSummary } from '../subject/subject.mapper';
import { ClassSummary, toClassSummary } from '../classes/class.mapper';
import { TeacherListItem, toTeacherListItem } from '../teacher/teacher.mapper';
import { loaded } from '../common/utils/relations';

export interface AssignmentSummary {
  id: string;
  title: string;
  assignmentType: AssignmentType;
  totalMarks: number;
  dueDate: Date;
}

export interface AssignmentDetail extends AssignmentSummary {
  description: string;
  subject: SubjectSummary;
  class: ClassSummary;
  teacher: TeacherListItem;
  assignmentTypeDisplay: string;
  instructions: string | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export function toAssignmentSummary(assignment: Assignment): AssignmentSummary {
  return {
    id: assignment.id,
    title: assignment.title,
    assignmentType: assignment.assignmentType,
    totalMarks: assignment.totalMarks,
    dueDate: assignment.dueDate,
  };
}

export function toAssignmentDetail(assignment: Assignment): AssignmentDetail {
  return {
    ...toAssignmentSummary(assignment),
    description: assignment.description,
    subject: toSubjectSummary(loaded(assignment.subject, 'assignment.subject')),
    class: toClassSummary(loaded(assignment.class, 'assignment.class')),
    teacher: toTeacherListItem(loaded(assignment.teacher, 'assignment.teacher')),
    assignmentTypeDisplay: ASSIGNMENT_TYPE_DISPLAY[assignment.assignmentType],
    instructions: assignment.instructions,
    isActive: assignment.isActive,
    createdAt: assignment.createdAt,
    updatedAt: assignment.updatedAt,
  };
}
