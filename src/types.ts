/**
 * Primitive payload of a scalar node. Integers are `bigint` and floats are
 * `number`, so `5` and `5.0` stay distinct and large integers keep every digit.
 */
export type ScalarValue = string | number | bigint | boolean | null;

/**
 * How a scalar was written in its source file.
 */
export type QuoteStyle = 'plain' | 'single' | 'double' | 'literal' | 'folded';

/**
 * Presentation details kept so a re-dump looks like the input.
 * Never consulted when comparing values.
 */
export interface ScalarFormat {
  /** Quote or block style */
  style?: QuoteStyle;

  /** Raw source text of a plain scalar (keeps `~`, `True`, empty nulls) */
  source?: string;

  /** Trailing zeros to keep on a float, e.g. 2 for `0.50` */
  minFractionDigits?: number;

  /** Number notation: HEX, OCT, EXP or BIN */
  numberFormat?: string;
}

export interface ScalarNode {
  kind: 'scalar';
  value: ScalarValue;
  /** Local or explicit tag, e.g. `!type:DoActsBehavior` */
  tag?: string;
  format?: ScalarFormat;
}

export interface SequenceNode {
  kind: 'sequence';
  items: YamlNode[];
  tag?: string;
}

/**
 * A single key/value pair of a mapping, in source order.
 */
export interface MappingEntry {
  key: string;
  value: YamlNode;
}

export interface MappingNode {
  kind: 'mapping';
  entries: MappingEntry[];
  tag?: string;
}

/**
 * Any structured value found in a prototype document.
 */
export type YamlNode = ScalarNode | SequenceNode | MappingNode;

/**
 * Loaded entity prototypes keyed by `id`. Read-only once populated.
 */
export type PrototypeIndex = Map<string, MappingNode>;

/**
 * Ancestor-supplied components grouped by component type, nearest first.
 */
export type AncestorComponentIndex = Map<string, MappingNode[]>;

/**
 * Fields dropped from one component of the sanitized prototype.
 */
export interface StrippedFields {
  /** The component's `type` */
  componentType: string;

  /** Dropped field names, in the component's key order */
  fields: string[];
}

/**
 * What a sanitize pass removed.
 */
export interface SanitizeReport {
  /** Types of components removed as wholly inherited, in document order */
  removedComponents: string[];

  /** Per-component field removals */
  strippedFields: StrippedFields[];

  /** Parent ids that could not be found in the index */
  unresolvedParents: string[];
}

/**
 * Result of sanitizing one prototype.
 */
export interface SanitizeResult {
  /** The minimal, field-ordered document */
  document: MappingNode;

  report: SanitizeReport;
}
