import { MappingNode, ScalarNode, ScalarValue, SequenceNode, YamlNode } from './types.js';

/**
 * A JSON-like value, used to build nodes in code and to expose them over the API
 */
export type PlainValue = string | number | boolean | null | PlainValue[] | { [key: string]: PlainValue };

export function scalar(value: ScalarValue, tag?: string): ScalarNode {
  return tag === undefined ? { kind: 'scalar', value } : { kind: 'scalar', value, tag };
}

export function sequence(items: YamlNode[], tag?: string): SequenceNode {
  return tag === undefined ? { kind: 'sequence', items } : { kind: 'sequence', items, tag };
}

export function mapping(entries: Array<[string, YamlNode]>, tag?: string): MappingNode {
  const node: MappingNode = {
    kind: 'mapping',
    entries: entries.map(([key, value]) => ({ key, value }))
  };
  if (tag !== undefined) {
    node.tag = tag;
  }
  return node;
}

/**
 * Value of the first entry with the given key
 */
export function getValue(node: MappingNode, key: string): YamlNode | undefined {
  return node.entries.find(entry => entry.key === key)?.value;
}

/**
 * Shallow copy of a mapping without the given keys. Values are shared.
 */
export function withoutKeys(node: MappingNode, keys: Iterable<string>): MappingNode {
  const drop = new Set(keys);
  const result: MappingNode = {
    kind: 'mapping',
    entries: node.entries.filter(entry => !drop.has(entry.key))
  };
  if (node.tag !== undefined) {
    result.tag = node.tag;
  }
  return result;
}

/**
 * Text of a scalar node, or undefined for collections and nulls
 */
export function scalarText(node: YamlNode | undefined): string | undefined {
  if (!node || node.kind !== 'scalar' || node.value === null) {
    return undefined;
  }
  return String(node.value);
}

export function cloneNode<T extends YamlNode>(node: T): T {
  return structuredClone(node);
}

/**
 * Build a node tree from a plain value. Object keys keep insertion order and
 * whole numbers become integers.
 */
export function fromPlain(value: PlainValue): YamlNode {
  if (Array.isArray(value)) {
    return sequence(value.map(fromPlain));
  }
  if (value !== null && typeof value === 'object') {
    return mapping(Object.entries(value).map(([key, item]): [string, YamlNode] => [key, fromPlain(item)]));
  }
  if (typeof value === 'number' && Number.isInteger(value)) {
    return scalar(BigInt(value));
  }
  return scalar(value);
}

/**
 * Drop tags and formatting, leaving a JSON-serializable value.
 * Integers beyond the safe range come out as their decimal text.
 */
export function toPlain(node: YamlNode): PlainValue {
  switch (node.kind) {
    case 'scalar':
      return plainScalar(node.value);
    case 'sequence':
      return node.items.map(toPlain);
    case 'mapping': {
      const seen = new Set<string>();
      const entries: Array<[string, PlainValue]> = [];
      for (const entry of node.entries) {
        if (!seen.has(entry.key)) {
          seen.add(entry.key);
          entries.push([entry.key, toPlain(entry.value)]);
        }
      }
      return Object.fromEntries(entries);
    }
  }
}

function plainScalar(value: ScalarValue): PlainValue {
  if (typeof value !== 'bigint') {
    return value;
  }
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
}
