import { EntityManager, EntityTarget, ObjectLiteral } from 'typeorm';
import { FieldValidationException } from '../exceptions/field-validation.exception';

/**
 * Loads the row a write refers to by id, or fails with a 400 naming the
 * request field that carried the id. `relations` are direct relation names.
 */
export async function findReferenceOrFail<T extends ObjectLiteral>(
  manager: EntityManager,
  entity: EntityTarget<T>,
  id: string,
  field: string,
  label: string,
  relations: string[] = [],
): Promise<T> {
  const qb = manager.createQueryBuilder(entity, 'ref').where('ref.id = :id', { id });
  for (const relation of relations) {
    qb.leftJoinAndSelect(`ref.${relation}`, `ref_${relation}`);
  }
  const found = await qb.getOne();
  if (!found) {
    throw new FieldValidationException(field, `${label} not found`);
  }
  return found;
}
