export enum Role {
  ADMIN = 'admin',
  TEACHER = 'teacher',
  STUDENT = 'student',
  STAFF = 'staff',
}

export const ROLE_DISPLAY: Record<Role, string> = {
  [Role.ADMIN]: 'Admin',
  [Role.TEACHER]: 'Teacher',
  [Role.STUDENT]: 'Student',
  [Role.STAFF]: 'Staff',
};
