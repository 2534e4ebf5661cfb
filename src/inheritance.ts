import { AncestorComponentIndex, MappingNode, PrototypeIndex, YamlNode } from './types.js';
import { getValue, scalarText } from './nodes.js';
import { InheritanceCycleError } from './errors.js';
import { Reporter, silentReporter } from './reporter.js';

/**
 * Options for collecting inherited components
 */
export interface CollectOptions {
  /** Where unresolved-parent warnings go (default: silent) */
  reporter?: Reporter;
  /** Receives every parent id that is not in the index */
  onUnresolvedParent?: (parentId: string) => void;
}

/**
 * Parent ids declared by a prototype, in declaration order.
 * A single id becomes a one-element list; anything that is neither a string
 * nor a sequence means no inheritance.
 */
export function parentIds(prototype: MappingNode): string[] {
  const parent = getValue(prototype, 'parent');
  if (!parent) {
    return [];
  }
  if (parent.kind === 'scalar') {
    return typeof parent.value === 'string' ? [parent.value] : [];
  }
  if (parent.kind === 'sequence') {
    return parent.items
      .map(item => scalarText(item))
      .filter((id): id is string => id !== undefined);
  }
  return [];
}

/**
 * The `components` sequence items that are mappings with a `type`, paired with that type
 */
export function typedComponents(prototype: MappingNode): Array<{ type: string; component: MappingNode }> {
  const components = getValue(prototype, 'components');
  if (!components || components.kind !== 'sequence') {
    return [];
  }

  const result: Array<{ type: string; component: MappingNode }> = [];
  for (const item of components.items) {
    const type = componentType(item);
    if (type !== undefined && item.kind === 'mapping') {
      result.push({ type, component: item });
    }
  }
  return result;
}

export function componentType(node: YamlNode): string | undefined {
  if (node.kind !== 'mapping') {
    return undefined;
  }
  return scalarText(getValue(node, 'type'));
}

/**
 * Walk the parent chain of `prototype` and group every ancestor component by type.
 *
 * For each parent in declaration order, its own components come first, followed
 * by everything its ancestors contribute. Components are appended, never
 * replaced, so a type declared by several ancestors lists each of them.
 * Unknown parents are reported and skipped. A parent chain that returns to a
 * prototype already on the path throws InheritanceCycleError.
 */
export function collectAncestorComponents(
  prototype: MappingNode,
  index: PrototypeIndex,
  options: CollectOptions = {}
): AncestorComponentIndex {
  const result: AncestorComponentIndex = new Map();
  const ownId = scalarText(getValue(prototype, 'id'));
  const path = ownId === undefined ? [] : [ownId];

  collectInto(prototype, index, options, path, result);
  return result;
}

function collectInto(
  prototype: MappingNode,
  index: PrototypeIndex,
  options: CollectOptions,
  path: string[],
  result: AncestorComponentIndex
): void {
  const reporter = options.reporter ?? silentReporter;

  for (const parentId of parentIds(prototype)) {
    if (path.includes(parentId)) {
      throw new InheritanceCycleError([...path, parentId]);
    }

    const parent = index.get(parentId);
    if (!parent) {
      reporter.warn(`Warning: Parent prototype '${parentId}' not found`);
      options.onUnresolvedParent?.(parentId);
      continue;
    }

    for (const { type, component } of typedComponents(parent)) {
      const configs = result.get(type);
      if (configs) {
        configs.push(component);
      } else {
        result.set(type, [component]);
      }
    }

    path.push(parentId);
    collectInto(parent, index, options, path, result);
    path.pop();
  }
}
