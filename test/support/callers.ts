import { Caller } from '../../src/common/access/caller';
import { Role } from '../../src/user/enums/role.enum';

export const adminCaller: Caller = { userId: 'u-admin', username: 'admin', role: Role.ADMIN };

export const staffCaller: Caller = { userId: 'u-staff', username: 'staff', role: Role.STAFF };

export function teacherCaller(id = 't1', classIds: string[] = ['c1']): Caller {
  return { userId: `u-${id}`, username: id, role: Role.TEACHER, teacher: { id, classIds } };
}

export function studentCaller(id = 's1', classId: string | null = 'c1'): Caller {
  return { userId: `u-${id}`, username: id, role: Role.STUDENT, student: { id, classId } };
}

export const unlinkedTeacher: Caller = { userId: 'u-x', username: 'x', role: Role.TEACHER, teacher: null };
