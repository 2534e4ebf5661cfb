import fs from 'fs-extra';
import { Document, Pair, Scalar, ScalarTag, YAMLMap, YAMLSeq } from 'yaml';
import { MappingNode, QuoteStyle, ScalarNode, YamlNode } from './types.js';

/**
 * Output layout: two-space indentation, sequences flush with their parent
 * key, and lines long enough that nothing is folded.
 */
export const RENDER_OPTIONS = {
  indent: 2,
  indentSeq: false,
  lineWidth: 4096
} as const;

/**
 * A tag written with nothing after it, e.g. `- !type:Foo`
 */
class BareTag {
  constructor(readonly tag: string) {}
}

const bareTag: ScalarTag = {
  tag: '!bare-tag',
  default: true,
  identify: value => value instanceof BareTag,
  resolve: value => value,
  stringify: ({ value }) => value instanceof BareTag ? value.tag : ''
};

/**
 * Serialize prototypes as a top-level YAML sequence.
 * Quote styles and tags recorded at parse time are written back.
 */
export function renderPrototypes(prototypes: MappingNode[]): string {
  const root = new YAMLSeq();
  for (const prototype of prototypes) {
    root.items.push(toYamlNode(prototype));
  }

  const doc = new Document(undefined, { customTags: [bareTag] });
  doc.contents = root;
  return doc.toString(RENDER_OPTIONS);
}

/**
 * Write rendered prototypes to `destination`, creating parent directories
 */
export async function writePrototypes(prototypes: MappingNode[], destination: string): Promise<void> {
  await fs.outputFile(destination, renderPrototypes(prototypes), 'utf-8');
}

function toYamlNode(node: YamlNode): Scalar | YAMLMap | YAMLSeq {
  switch (node.kind) {
    case 'scalar':
      return toYamlScalar(node);
    case 'sequence': {
      const seq = new YAMLSeq();
      for (const item of node.items) {
        seq.items.push(toYamlNode(item));
      }
      if (node.tag) {
        seq.tag = node.tag;
      }
      return seq;
    }
    case 'mapping': {
      const map = new YAMLMap();
      for (const entry of node.entries) {
        map.items.push(new Pair(new Scalar(entry.key), toYamlNode(entry.value)));
      }
      if (node.tag) {
        map.tag = node.tag;
      }
      return map;
    }
  }
}

function toYamlScalar(node: ScalarNode): Scalar {
  const format = node.format;
  if (node.tag && node.value === null && format?.source === '') {
    return new Scalar(new BareTag(node.tag));
  }

  const result = new Scalar(node.value);

  if (format?.style) {
    result.type = scalarType(format.style);
  }
  if (format?.source !== undefined) {
    result.source = format.source;
  }
  if (format?.minFractionDigits !== undefined) {
    result.minFractionDigits = format.minFractionDigits;
  }
  if (format?.numberFormat !== undefined) {
    result.format = format.numberFormat;
  }
  if (node.tag) {
    result.tag = node.tag;
  }
  return result;
}

function scalarType(style: QuoteStyle): Scalar.Type {
  switch (style) {
    case 'plain':
      return Scalar.PLAIN;
    case 'single':
      return Scalar.QUOTE_SINGLE;
    case 'double':
      return Scalar.QUOTE_DOUBLE;
    case 'literal':
      return Scalar.BLOCK_LITERAL;
    case 'folded':
      return Scalar.BLOCK_FOLDED;
  }
}
