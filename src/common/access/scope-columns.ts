import { ScopeColumns } from './scope-query';

// Column each access fact maps to, per query root alias
export const TEACHER_SCOPE_COLUMNS: ScopeColumns = {
  teacherId: 'teacher.id',
  userId: 'teacher.userId',
};

export const CLASS_SCOPE_COLUMNS: ScopeColumns = {
  classId: 'cls.id',
  teacherId: 'cls.teacherId',
};

export const STUDENT_SCOPE_COLUMNS: ScopeColumns = {
  studentId: 'student.id',
  userId: 'student.userId',
  classId: 'student.classId',
};

export const ASSIGNMENT_SCOPE_COLUMNS: ScopeColumns = {
  classId: 'assignment.classId',
  teacherId: 'assignment.teacherId',
};

// Grades are scoped by the graded student's class; the query must join `student`
export const GRADE_SCOPE_COLUMNS: ScopeColumns = {
  studentId: 'grade.studentId',
  classId: 'student.classId',
  teacherId: 'grade.gradedById',
};

export const ATTENDANCE_SCOPE_COLUMNS: ScopeColumns = {
  studentId: 'attendance.studentId',
  classId: 'attendance.classId',
  teacherId: 'attendance.markedById',
};
