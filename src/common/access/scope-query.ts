import { ObjectLiteral, SelectQueryBuilder } from 'typeorm';
import { AccessField, Scope } from './access-policy';

export type ScopeColumns = Partial<Record<AccessField, string>>;

export interface ScopeClause {
  clause: string;
  params: Record<string, string[]>;
}

/**
 * Renders a `where` scope as one bracketed OR clause.
 * Returns null for `all`; `none` has no SQL form and must be handled by the caller.
 */
export function scopeClause(scope: Scope, columns: ScopeColumns, prefix = 'scope'): ScopeClause | null {
  if (scope.kind === 'all') return null;
  if (scope.kind === 'none') {
    throw new Error('A NONE scope cannot be rendered as SQL');
  }

  const params: Record<string, string[]> = {};
  const parts = scope.conditions.map((condition, index) => {
    const column = columns[condition.field];
    if (!column) {
      throw new Error(`No column mapped for access field "${condition.field}"`);
    }
    const param = `${prefix}_${condition.field}_${index}`;
    params[param] = condition.anyOf;
    return `${column} IN (:...${param})`;
  });

  return { clause: `(${parts.join(' OR ')})`, params };
}

/**
 * Narrows the query to the scope. Returns false when the scope is NONE so the
 * caller can skip the query entirely.
 */
export function applyScope<T extends ObjectLiteral>(
  qb: SelectQueryBuilder<T>,
  scope: Scope,
  columns: ScopeColumns,
  prefix?: string,
): boolean {
  if (scope.kind === 'none') return false;
  const rendered = scopeClause(scope, columns, prefix);
  if (rendered) {
    qb.andWhere(rendered.clause, rendered.params);
  }
  return true;
}
