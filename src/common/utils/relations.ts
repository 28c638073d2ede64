/** Unwraps a relation the query was expected to join. */
export function loaded<T>(value: T | null | undefined, relation: string): T {
  if (value === null || value === undefined) {
    throw new Error(`Relation "${relation}" was not loaded`);
  }
  return value;
}
