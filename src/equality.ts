import { MappingNode, YamlNode } from './types.js';
import { getValue, withoutKeys } from './nodes.js';

/**
 * Structural comparison of `a` against `b`.
 *
 * Mappings compare by containment: every key of `a` must exist in `b` with an
 * equal value, but `b` may carry extra keys. So `equal({a:1}, {a:1, b:2})` holds
 * while the reverse does not. Sequences must match pairwise in order. Scalars
 * compare by primitive value and type, so the integer `5` differs from the
 * float `5.0` and from the string `"5"`; tags and quote style are ignored.
 *
 * Never throws. Any failure while comparing counts as "not equal".
 */
export function structurallyEqual(a: YamlNode, b: YamlNode): boolean {
  try {
    return compareNodes(a, b);
  } catch {
    return false;
  }
}

function compareNodes(a: YamlNode, b: YamlNode): boolean {
  if (a.kind === 'scalar') {
    return b.kind === 'scalar' && a.value === b.value;
  }

  if (a.kind === 'sequence') {
    if (b.kind !== 'sequence' || a.items.length !== b.items.length) {
      return false;
    }
    return a.items.every((item, i) => compareNodes(item, b.items[i]));
  }

  if (b.kind !== 'mapping') {
    return false;
  }
  return a.entries.every(entry => {
    const other = getValue(b, entry.key);
    return other !== undefined && compareNodes(entry.value, other);
  });
}

/**
 * Whole-component comparison, ignoring the `type` field.
 *
 * Two components with nothing beyond `type` are equal. If only one of them has
 * fields they never are. Otherwise the child's fields must be contained in the
 * parent's (see structurallyEqual).
 */
export function componentsEqual(child: MappingNode, parent: MappingNode): boolean {
  const childFields = withoutKeys(child, ['type']);
  const parentFields = withoutKeys(parent, ['type']);

  const childEmpty = childFields.entries.length === 0;
  const parentEmpty = parentFields.entries.length === 0;
  if (childEmpty && parentEmpty) {
    return true;
  }
  if (childEmpty !== parentEmpty) {
    return false;
  }

  return structurallyEqual(childFields, parentFields);
}

/**
 * Field names of `component` (other than `type`) whose value some ancestor
 * component supplies identically. Returned in the component's key order.
 */
export function inheritedFields(component: MappingNode, ancestors: MappingNode[]): string[] {
  const redundant = new Set<string>();

  for (const ancestor of ancestors) {
    for (const entry of component.entries) {
      if (entry.key === 'type' || redundant.has(entry.key)) {
        continue;
      }
      const inherited = getValue(ancestor, entry.key);
      if (inherited !== undefined && structurallyEqual(entry.value, inherited)) {
        redundant.add(entry.key);
      }
    }
  }

  return component.entries.map(entry => entry.key).filter(key => redundant.has(key));
}
