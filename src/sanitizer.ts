import { MappingNode, PrototypeIndex, SanitizeReport, SanitizeResult } from './types.js';
import { cloneNode, getValue, withoutKeys } from './nodes.js';
import { componentsEqual, inheritedFields } from './equality.js';
import { collectAncestorComponents, componentType } from './inheritance.js';
import { orderPrototypeFields } from './field-order.js';
import { PrototypeNotFoundError } from './errors.js';
import { Reporter, silentReporter } from './reporter.js';

/**
 * Options for sanitizing a prototype
 */
export interface SanitizeOptions {
  /** Where progress and diagnostic messages go (default: silent) */
  reporter?: Reporter;
}

/**
 * Remove components and component fields that `prototype` already inherits,
 * with identical values, from its parent chain.
 *
 * Works on a deep copy; neither `prototype` nor the index is modified.
 * A component equal to some ancestor component of its type is removed whole.
 * Otherwise each field that any ancestor component of the same type supplies
 * identically is dropped, which may leave a bare `{ type }` behind.
 */
export function sanitizePrototype(
  prototype: MappingNode,
  index: PrototypeIndex,
  options: SanitizeOptions = {}
): SanitizeResult {
  const reporter = options.reporter ?? silentReporter;
  const report: SanitizeReport = { removedComponents: [], strippedFields: [], unresolvedParents: [] };
  const sanitized = cloneNode(prototype);

  const components = getValue(sanitized, 'components');
  if (!components || components.kind !== 'sequence') {
    return { document: orderPrototypeFields(sanitized), report };
  }

  const inherited = collectAncestorComponents(sanitized, index, {
    reporter,
    onUnresolvedParent: parentId => report.unresolvedParents.push(parentId)
  });

  const removeAt = new Set<number>();

  components.items = components.items.map((item, i) => {
    const type = componentType(item);
    if (type === undefined || item.kind !== 'mapping') {
      return item;
    }

    const ancestors = inherited.get(type);
    if (!ancestors) {
      return item;
    }

    if (ancestors.some(ancestor => componentsEqual(item, ancestor))) {
      removeAt.add(i);
      report.removedComponents.push(type);
      return item;
    }

    const fields = inheritedFields(item, ancestors);
    if (fields.length === 0) {
      return item;
    }
    report.strippedFields.push({ componentType: type, fields });
    reporter.info(`- Removed redundant fields from ${type}: ${fields.join(', ')}`);
    return withoutKeys(item, fields);
  });

  if (removeAt.size > 0) {
    components.items = components.items.filter((_item, i) => !removeAt.has(i));
    reporter.info(`Removing ${removeAt.size} redundant components`);
    for (const type of report.removedComponents) {
      reporter.info(`- ${type}`);
    }
  } else {
    reporter.info('No redundant components found');
  }

  return { document: orderPrototypeFields(sanitized), report };
}

/**
 * Look up a prototype by id and sanitize it.
 * Throws PrototypeNotFoundError when the id is not in the index.
 */
export function findAndSanitize(
  prototypeId: string,
  index: PrototypeIndex,
  options: SanitizeOptions = {}
): SanitizeResult {
  const prototype = index.get(prototypeId);
  if (!prototype) {
    throw new PrototypeNotFoundError(prototypeId);
  }

  (options.reporter ?? silentReporter).info(`Found prototype '${prototypeId}'`);
  return sanitizePrototype(prototype, index, options);
}
