import { Student, Gender, GENDER_DISPLAY } from './entities/student.entity';
import { fullName } from '../user/entities/user.entity';
import { toUserSummary, UserSummary } from '../user/user.mapper';
import { ClassSummary, toClassSummary } from '../classes/class.mapper';
import { loaded } from '../common/utils/relations';

export interface StudentListItem {
  id: string;
  name: string;
  email: string | null;
  studentId: string;
  rollNumber: string;
  className: string | null;
}

export interface StudentDetail {
  id: string;
  user: UserSummary;
  studentId: string;
  rollNumber: string;
  class: ClassSummary | null;
  gender: Gender;
  genderDisplay: string;
  guardianName: string;
  guardianPhone: string;
  guardianEmail: string | null;
  emergencyContact: string | null;
  admissionDate: string;
  bloodGroup: string | null;
  medicalConditions: string | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export function toStudentListItem(student: Student): StudentListItem {
  const user = loaded(student.user, 'student.user');
  return {
    id: student.id,
    name: fullName(user),
    email: user.email,
    studentId: student.studentId,
    rollNumber: student.rollNumber,
    className: student.class?.name ?? null,
  };
}

export function toStudentDetail(student: Student): StudentDetail {
  return {
    id: student.id,
    user: toUserSummary(loaded(student.user, 'student.user')),
    studentId: student.studentId,
    rollNumber: student.rollNumber,
    class: student.class ? toClassSummary(student.class) : null,
    gender: student.gender,
    genderDisplay: GENDER_DISPLAY[student.gender],
    guardianName: student.guardianName,
    guardianPhone: student.guardianPhone,
    guardianEmail: student.guardianEmail,
    emergencyContact: student.emergencyContact,
    admissionDate: student.admissionDate,
    bloodGroup: student.bloodGroup,
    medicalConditions: student.medicalConditions,
    isActive: student.isActive,
    createdAt: student.createdAt,
    updatedAt: student.updatedAt,
  };
}
