import { Role } from '../../user/enums/role.enum';
import { Caller, StudentLink, TeacherLink } from './caller';

export enum Resource {
  USER = 'user',
  SUBJECT = 'subject',
  TEACHER = 'teacher',
  CLASS = 'class',
  STUDENT = 'student',
  ASSIGNMENT = 'assignment',
  GRADE = 'grade',
  ATTENDANCE = 'attendance',
}

export enum Action {
  READ = 'read',
  WRITE = 'write',
}

/** Identifiers a record exposes to the policy. */
export type AccessField = 'userId' | 'teacherId' | 'studentId' | 'classId';
export type AccessFacts = Partial<Record<AccessField, string | null>>;

export interface Condition {
  field: AccessField;
  anyOf: string[];
}

/**
 * `where` is a disjunction: a record is in scope when any condition holds.
 */
export type Scope =
  | { kind: 'all' }
  | { kind: 'none' }
  | { kind: 'where'; conditions: Condition[] };

export interface Grant {
  read: Scope;
  write: Scope;
}

export type Grants = Record<Resource, Grant>;

export const ALL: Scope = { kind: 'all' };
export const NONE: Scope = { kind: 'none' };

const FULL: Grant = { read: ALL, write: ALL };
const READ_ONLY: Grant = { read: ALL, write: NONE };
const DENIED: Grant = { read: NONE, write: NONE };

function match(field: AccessField, ...ids: Array<string | null | undefined>): Condition {
  return { field, anyOf: ids.filter((id): id is string => typeof id === 'string' && id.length > 0) };
}

// Conditions without ids can never hold, so they collapse to NONE
function where(...conditions: Condition[]): Scope {
  const live = conditions.filter((c) => c.anyOf.length > 0);
  return live.length > 0 ? { kind: 'where', conditions: live } : NONE;
}

function readOnly(scope: Scope): Grant {
  return { read: scope, write: NONE };
}

function uniform(grant: Grant): Grants {
  return {
    [Resource.USER]: grant,
    [Resource.SUBJECT]: grant,
    [Resource.TEACHER]: grant,
    [Resource.CLASS]: grant,
    [Resource.STUDENT]: grant,
    [Resource.ASSIGNMENT]: grant,
    [Resource.GRADE]: grant,
    [Resource.ATTENDANCE]: grant,
  };
}

function teacherGrants(teacher: TeacherLink): Grants {
  const ownClasses = where(match('classId', ...teacher.classIds));
  const ownClassesOrAuthored = where(
    match('classId', ...teacher.classIds),
    match('teacherId', teacher.id),
  );
  const taught = where(match('teacherId', teacher.id));

  return {
    [Resource.USER]: DENIED,
    [Resource.SUBJECT]: READ_ONLY,
    [Resource.TEACHER]: { read: ALL, write: taught },
    [Resource.CLASS]: { read: taught, write: taught },
    [Resource.STUDENT]: { read: ownClasses, write: ownClasses },
    [Resource.ASSIGNMENT]: { read: ownClassesOrAuthored, write: ownClassesOrAuthored },
    [Resource.GRADE]: { read: ownClassesOrAuthored, write: ownClassesOrAuthored },
    [Resource.ATTENDANCE]: { read: ownClassesOrAuthored, write: ownClassesOrAuthored },
  };
}

function studentGrants(student: StudentLink): Grants {
  const self = where(match('studentId', student.id));
  const enrolledClass = where(match('classId', student.classId));

  return {
    [Resource.USER]: DENIED,
    [Resource.SUBJECT]: READ_ONLY,
    [Resource.TEACHER]: READ_ONLY,
    [Resource.CLASS]: readOnly(enrolledClass),
    [Resource.STUDENT]: readOnly(self),
    [Resource.ASSIGNMENT]: readOnly(enrolledClass),
    [Resource.GRADE]: readOnly(self),
    [Resource.ATTENDANCE]: readOnly(self),
  };
}

export function grantsFor(caller: Caller): Grants {
  switch (caller.role) {
    case Role.ADMIN:
      return uniform(FULL);
    case Role.STAFF:
      return { ...uniform(READ_ONLY), [Resource.USER]: DENIED };
    case Role.TEACHER:
      return caller.teacher ? teacherGrants(caller.teacher) : uniform(DENIED);
    case Role.STUDENT:
      return caller.student ? studentGrants(caller.student) : uniform(DENIED);
  }
}

export function scopeFor(caller: Caller, resource: Resource, action: Action = Action.READ): Scope {
  return grantsFor(caller)[resource][action];
}

export function satisfies(scope: Scope, facts: AccessFacts): boolean {
  switch (scope.kind) {
    case 'all':
      return true;
    case 'none':
      return false;
    case 'where':
      return scope.conditions.some((condition) => {
        const value = facts[condition.field];
        return typeof value === 'string' && condition.anyOf.includes(value);
      });
  }
}

export function canAccess(caller: Caller, resource: Resource, action: Action, facts: AccessFacts = {}): boolean {
  return satisfies(scopeFor(caller, resource, action), facts);
}

/** Whether the caller may write some record of the resource at all. */
export function mayWrite(caller: Caller, resource: Resource): boolean {
  return scopeFor(caller, resource, Action.WRITE).kind !== 'none';
}
