import { Role } from '../../user/enums/role.enum';

export interface TeacherLink {
  id: string;
  classIds: string[];
}

export interface StudentLink {
  id: string;
  classId: string | null;
}

interface CallerBase {
  userId: string;
  username: string;
}

/**
 * The authenticated account, resolved once per request by the JWT strategy
 * and handed explicitly to every service that scopes or authorizes.
 *
 * A teacher or student account whose profile row is missing carries `null`
 * in its link and is denied by the access policy.
 */
export type Caller =
  | (CallerBase & { role: Role.ADMIN })
  | (CallerBase & { role: Role.STAFF })
  | (CallerBase & { role: Role.TEACHER; teacher: TeacherLink | null })
  | (CallerBase & { role: Role.STUDENT; student: StudentLink | null });

export function teacherIdOf(caller: Caller): string | null {
  return caller.role === Role.TEACHER && caller.teacher ? caller.teacher.id : null;
}

export function studentIdOf(caller: Caller): string | null {
  return caller.role === Role.STUDENT && caller.student ? caller.student.id : null;
}

const ROLES: readonly string[] = Object.values(Role);

export function isCaller(value: unknown): value is Caller {
  if (typeof value !== 'object' || value === null) return false;
  if (!('userId' in value) || !('role' in value)) return false;
  return typeof value.userId === 'string' && typeof value.role === 'string' && ROLES.includes(value.role);
}
