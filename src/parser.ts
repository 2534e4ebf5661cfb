import { Document, isAlias, isMap, isScalar, isSeq, parseDocument, Scalar, YAMLMap } from 'yaml';
import { MappingEntry, MappingNode, QuoteStyle, ScalarFormat, ScalarNode, ScalarValue, SequenceNode, YamlNode } from './types.js';
import { getValue, scalarText } from './nodes.js';
import { YamlParseError } from './errors.js';

/**
 * Prototype type that is eligible for sanitizing
 */
export const ENTITY_TYPE = 'entity';

const MERGE_KEY = '<<';
const STRING_TAG = 'tag:yaml.org,2002:str';

/**
 * Result of parsing one prototype file.
 */
export interface ParseResult {
  /** The file the content came from */
  documentId: string;

  /** Entity prototypes found at the top level, in file order */
  prototypes: MappingNode[];

  /** Non-fatal issues reported by the YAML parser */
  warnings: string[];
}

/**
 * Parse a prototype file and keep the entries that are entity prototypes:
 * mappings with `type: entity` and an `id`. A file whose root is not a
 * sequence holds no prototypes.
 *
 * Aliases become copies of their anchored values and `<<` merge keys are
 * expanded in place, so neither anchors nor merge keys reach the output.
 */
export function parsePrototypes(content: string, documentId: string): ParseResult {
  const doc = parseDocument(stripBom(content), { intAsBigInt: true });

  if (doc.errors.length > 0) {
    throw new YamlParseError(documentId, doc.errors[0].message);
  }

  // Local tags such as !type:Foo are expected and kept as-is
  const warnings = doc.warnings
    .filter(warning => warning.code !== 'TAG_RESOLVE_FAILED')
    .map(warning => warning.message);

  const root = doc.contents === null ? null : convertNode(doc.contents, doc);
  const prototypes: MappingNode[] = [];

  if (root?.kind === 'sequence') {
    for (const item of root.items) {
      if (isEntityPrototype(item)) {
        prototypes.push(item);
      }
    }
  }

  return { documentId, prototypes, warnings };
}

/**
 * The `id` of an entity prototype
 */
export function prototypeId(prototype: MappingNode): string | undefined {
  return scalarText(getValue(prototype, 'id'));
}

function isEntityPrototype(node: YamlNode): node is MappingNode {
  if (node.kind !== 'mapping') {
    return false;
  }
  return scalarText(getValue(node, 'type')) === ENTITY_TYPE && prototypeId(node) !== undefined;
}

function stripBom(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

function convertNode(node: unknown, doc: Document.Parsed): YamlNode {
  if (isAlias(node)) {
    const target = node.resolve(doc);
    return target ? convertNode(target, doc) : { kind: 'scalar', value: null };
  }

  if (isScalar(node)) {
    return convertScalar(node);
  }

  if (isSeq(node)) {
    const result: SequenceNode = { kind: 'sequence', items: node.items.map(item => convertNode(item, doc)) };
    if (node.tag) {
      result.tag = node.tag;
    }
    return result;
  }

  if (isMap(node)) {
    return convertMapping(node, doc);
  }

  // Missing values (`key:` with nothing after it)
  return { kind: 'scalar', value: null };
}

/**
 * Explicit keys win over merged ones, and earlier merge sources over later ones.
 */
function convertMapping(node: YAMLMap, doc: Document.Parsed): MappingNode {
  const explicit = new Set<string>();
  for (const pair of node.items) {
    if (!isMergeKey(pair.key)) {
      explicit.add(keyText(pair.key));
    }
  }

  const entries: MappingEntry[] = [];
  const seen = new Set<string>();
  for (const pair of node.items) {
    const value = convertNode(pair.value, doc);
    const merged = isMergeKey(pair.key) ? mergeSources(value) : undefined;

    if (!merged) {
      const key = keyText(pair.key);
      entries.push({ key, value });
      seen.add(key);
      continue;
    }
    for (const entry of merged.flatMap(source => source.entries)) {
      if (!explicit.has(entry.key) && !seen.has(entry.key)) {
        entries.push(entry);
        seen.add(entry.key);
      }
    }
  }

  const result: MappingNode = { kind: 'mapping', entries };
  if (node.tag) {
    result.tag = node.tag;
  }
  return result;
}

function isMergeKey(key: unknown): boolean {
  return isScalar(key) && key.value === MERGE_KEY && key.type === Scalar.PLAIN;
}

function keyText(key: unknown): string {
  return isScalar(key) ? String(key.value) : String(key);
}

/**
 * Mappings a merge key pulls in, or undefined when the value cannot be merged
 */
function mergeSources(value: YamlNode): MappingNode[] | undefined {
  if (value.kind === 'mapping') {
    return [value];
  }
  if (value.kind === 'sequence') {
    const sources = value.items.filter((item): item is MappingNode => item.kind === 'mapping');
    return sources.length === value.items.length ? sources : undefined;
  }
  return undefined;
}

function convertScalar(node: Scalar): ScalarNode {
  const style = quoteStyle(node.type);
  // `key:` or a bare `!tag` with nothing after it
  const empty = style === 'plain' && node.source === '' && node.tag !== STRING_TAG;
  const value = empty ? null : toScalarValue(node.value);
  const result: ScalarNode = { kind: 'scalar', value };

  const format: ScalarFormat = {};
  if (style) {
    format.style = style;
  }
  if ((value === null || typeof value === 'boolean') && node.source !== undefined) {
    format.source = node.source;
  }
  if (node.minFractionDigits !== undefined) {
    format.minFractionDigits = node.minFractionDigits;
  }
  if (node.format !== undefined) {
    format.numberFormat = node.format;
  }

  if (Object.keys(format).length > 0) {
    result.format = format;
  }
  if (node.tag) {
    result.tag = node.tag;
  }
  return result;
}

function toScalarValue(value: unknown): ScalarValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return value;
  }
  return String(value);
}

function quoteStyle(type: Scalar.Type | undefined): QuoteStyle | undefined {
  switch (type) {
    case Scalar.PLAIN:
      return 'plain';
    case Scalar.QUOTE_SINGLE:
      return 'single';
    case Scalar.QUOTE_DOUBLE:
      return 'double';
    case Scalar.BLOCK_LITERAL:
      return 'literal';
    case Scalar.BLOCK_FOLDED:
      return 'folded';
    default:
      return undefined;
  }
}
