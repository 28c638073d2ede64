import { EntityManager, In } from 'typeorm';
import { Subject } from './entities/subject.entity';
import { FieldValidationException } from '../common/exceptions/field-validation.exception';

/** Loads every listed subject or fails naming the request field. */
export async function findSubjectsOrFail(
  manager: EntityManager,
  ids: string[] | undefined,
  field = 'subjectIds',
): Promise<Subject[]> {
  const unique = [...new Set(ids ?? [])];
  if (unique.length === 0) return [];

  const subjects = await manager.findBy(Subject, { id: In(unique) });
  if (subjects.length !== unique.length) {
    const found = new Set(subjects.map((s) => s.id));
    const missing = unique.filter((id) => !found.has(id));
    throw new FieldValidationException(field, `Unknown subject id(s): ${missing.join(', ')}`);
  }
  return subjects;
}
