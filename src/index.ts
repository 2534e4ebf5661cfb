export * from './types.js';
export * from './errors.js';
export { scalar, sequence, mapping, getValue, withoutKeys, cloneNode, fromPlain, toPlain } from './nodes.js';
export type { PlainValue } from './nodes.js';
export { structurallyEqual, componentsEqual, inheritedFields } from './equality.js';
export { collectAncestorComponents, parentIds } from './inheritance.js';
export type { CollectOptions } from './inheritance.js';
export { sanitizePrototype, findAndSanitize } from './sanitizer.js';
export type { SanitizeOptions } from './sanitizer.js';
export { orderPrototypeFields, PROTOTYPE_FIELD_ORDER } from './field-order.js';
export { parsePrototypes, prototypeId, ENTITY_TYPE } from './parser.js';
export type { ParseResult } from './parser.js';
export { renderPrototypes, writePrototypes } from './renderer.js';
export { loadPrototypes, findPrototypeFiles } from './loader.js';
export type { LoadOptions, LoadResult } from './loader.js';
export { loadConfig, DEFAULT_CONFIG } from './config.js';
export type { SanitizerConfig } from './config.js';
export { consoleReporter, silentReporter } from './reporter.js';
export type { Reporter } from './reporter.js';
