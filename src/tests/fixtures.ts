import { fromPlain, getValue, PlainValue, toPlain } from '../nodes.js';
import { MappingNode, PrototypeIndex } from '../types.js';
import { prototypeId } from '../parser.js';
import { Reporter } from '../reporter.js';

export type PlainMapping = { [key: string]: PlainValue };

/**
 * Build a mapping node from a plain object
 */
export function node(value: PlainMapping): MappingNode {
  const result = fromPlain(value);
  if (result.kind !== 'mapping') {
    throw new Error('expected a mapping');
  }
  return result;
}

/**
 * Build an entity prototype index keyed by each prototype's id
 */
export function buildIndex(...prototypes: PlainMapping[]): PrototypeIndex {
  const index: PrototypeIndex = new Map();
  for (const plain of prototypes) {
    const prototype = node({ type: 'entity', ...plain });
    const id = prototypeId(prototype);
    if (id === undefined) {
      throw new Error('fixture prototype needs an id');
    }
    index.set(id, prototype);
  }
  return index;
}

export function lookup(index: PrototypeIndex, id: string): MappingNode {
  const prototype = index.get(id);
  if (!prototype) {
    throw new Error(`fixture prototype '${id}' missing`);
  }
  return prototype;
}

/**
 * Plain value of a prototype's `components`
 */
export function componentsOf(prototype: MappingNode): PlainValue | undefined {
  const components = getValue(prototype, 'components');
  return components ? toPlain(components) : undefined;
}

export interface RecordingReporter extends Reporter {
  infos: string[];
  warnings: string[];
  errors: string[];
}

export function recordingReporter(): RecordingReporter {
  const infos: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];
  return {
    infos,
    warnings,
    errors,
    info: message => infos.push(message),
    warn: message => warnings.push(message),
    error: message => errors.push(message)
  };
}
