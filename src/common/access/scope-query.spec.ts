import { ObjectLiteral, SelectQueryBuilder } from 'typeorm';
import { applyScope, scopeClause } from './scope-query';
import { Resource, scopeFor } from './access-policy';
import { ASSIGNMENT_SCOPE_COLUMNS } from './scope-columns';
import { teacherCaller } from '../../../test/support/callers';
import { queryBuilderMock } from '../../../test/support/query-builder.mock';

describe('scopeClause', () => {
  it('renders a where scope as one OR clause', () => {
    const scope = scopeFor(teacherCaller('t1', ['c1', 'c2']), Resource.ASSIGNMENT);

    expect(scopeClause(scope, ASSIGNMENT_SCOPE_COLUMNS)).toEqual({
      clause: '(assignment.classId IN (:...scope_classId_0) OR assignment.teacherId IN (:...scope_teacherId_1))',
      params: { scope_classId_0: ['c1', 'c2'], scope_teacherId_1: ['t1'] },
    });
  });

  it('returns null for an unrestricted scope', () => {
    expect(scopeClause({ kind: 'all' }, ASSIGNMENT_SCOPE_COLUMNS)).toBeNull();
  });

  it('fails when a condition has no mapped column', () => {
    const scope = { kind: 'where' as const, conditions: [{ field: 'studentId' as const, anyOf: ['s1'] }] };
    expect(() => scopeClause(scope, ASSIGNMENT_SCOPE_COLUMNS)).toThrow(
      'No column mapped for access field "studentId"',
    );
  });
});

describe('applyScope', () => {
  function build() {
    const mock = queryBuilderMock();
    return { mock, qb: mock as unknown as SelectQueryBuilder<ObjectLiteral> };
  }

  it('skips the query for a none scope', () => {
    const { mock, qb } = build();
    expect(applyScope(qb, { kind: 'none' }, ASSIGNMENT_SCOPE_COLUMNS)).toBe(false);
    expect(mock.andWhere).not.toHaveBeenCalled();
  });

  it('leaves the query untouched for an all scope', () => {
    const { mock, qb } = build();
    expect(applyScope(qb, { kind: 'all' }, ASSIGNMENT_SCOPE_COLUMNS)).toBe(true);
    expect(mock.andWhere).not.toHaveBeenCalled();
  });

  it('adds the rendered clause', () => {
    const { mock, qb } = build();
    const scope = { kind: 'where' as const, conditions: [{ field: 'classId' as const, anyOf: ['c1'] }] };

    expect(applyScope(qb, scope, ASSIGNMENT_SCOPE_COLUMNS, 'own')).toBe(true);
    expect(mock.andWhere).toHaveBeenCalledWith('(assignment.classId IN (:...own_classId_0))', {
      own_classId_0: ['c1'],
    });
  });
});
