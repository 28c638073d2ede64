import { Grade } from './entity/grade.entity';
import { StudentListItem, toStudentListItem } from '../student/student.mapper';
import { AssignmentSummary, toAssignmentSummary } from '../assignment/assignment.mapper';
import { TeacherListItem, toTeacherListItem } from '../teacher/teacher.mapper';
import { loaded } from '../common/utils/relations';
import { computePercentage, roundTo2 } from './grade-letter';

export interface GradeDetail {
  id: string;
  student: StudentListItem;
  assignment: AssignmentSummary;
  marksObtained: number;
  percentage: number;
  gradeLetter: string;
  comments: string | null;
  submittedDate: Date;
  gradedDate: Date;
  gradedBy: TeacherListItem;
}

export function toGradeDetail(grade: Grade): GradeDetail {
  const assignment = loaded(grade.assignment, 'grade.assignment');
  return {
    id: grade.id,
    student: toStudentListItem(loaded(grade.student, 'grade.student')),
    assignment: toAssignmentSummary(assignment),
    marksObtained: grade.marksObtained,
    percentage: roundTo2(computePercentage(grade.marksObtained, assignment.totalMarks)),
    gradeLetter: grade.gradeLetter,
    comments: grade.comments,
    submittedDate: grade.submittedDate,
    gradedDate: grade.gradedDate,
    gradedBy: toTeacherListItem(loaded(grade.gradedBy, 'grade.gradedBy')),
  };
}
