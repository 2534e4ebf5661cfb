import { MappingNode } from './types.js';

/**
 * Canonical order of top-level prototype keys
 */
export const PROTOTYPE_FIELD_ORDER = [
  'type',
  'abstract',
  'parent',
  'id',
  'categories',
  'name',
  'suffix',
  'description',
  'components'
] as const;

/**
 * Reorder the top-level keys of a prototype: known keys in canonical order,
 * then the rest in their original order. Nested values are untouched.
 */
export function orderPrototypeFields(prototype: MappingNode): MappingNode {
  const known: ReadonlyArray<string> = PROTOTYPE_FIELD_ORDER;
  const ordered = PROTOTYPE_FIELD_ORDER.flatMap(key => prototype.entries.filter(entry => entry.key === key));
  const rest = prototype.entries.filter(entry => !known.includes(entry.key));

  const result: MappingNode = { kind: 'mapping', entries: [...ordered, ...rest] };
  if (prototype.tag !== undefined) {
    result.tag = prototype.tag;
  }
  return result;
}
