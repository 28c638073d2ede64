import { Attendance, AttendanceStatus, ATTENDANCE_STATUS_DISPLAY } from './entity/attendance.entity';
import { StudentListItem, toStudentListItem } from '../student/student.mapper';
import { ClassSummary, toClassSummary } from '../classes/class.mapper';
import { SubjectSummary, toSubjectSummary } from '../subject/subject.mapper';
import { TeacherListItem, toTeacherListItem } from '../teacher/teacher.mapper';
import { loaded } from '../common/utils/relations';

export interface AttendanceDetail {
  id: string;
  student: StudentListItem;
  class: ClassSummary;
  subject: SubjectSummary;
  date: string;
  status: AttendanceStatus;
  statusDisplay: string;
  markedBy: TeacherListItem;
  notes: string | null;
  markedAt: Date;
}

export function toAttendanceDetail(attendance: Attendance): AttendanceDetail {
  return {
    id: attendance.id,
    student: toStudentListItem(loaded(attendance.student, 'attendance.student')),
    class: toClassSummary(loaded(attendance.class, 'attendance.class')),
    subject: toSubjectSummary(loaded(attendance.subject, 'attendance.subject')),
    date: attendance.date,
    status: attendance.status,
    statusDisplay: ATTENDANCE_STATUS_DISPLAY[attendance.status],
    markedBy: toTeacherListItem(loaded(attendance.markedBy, 'attendance.markedBy')),
    notes: attendance.notes,
    markedAt: attendance.markedAt,
  };
}
