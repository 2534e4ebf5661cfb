export class PrototypeNotFoundError extends Error {
  constructor(public readonly prototypeId: string, public readonly statusCode: number = 404) {
    super(`Prototype '${prototypeId}' not found`);
    this.name = 'PrototypeNotFoundError';
  }
}

/**
 * A parent chain that leads back to a prototype already on the path.
 * `chain` ends with the revisited id.
 */
export class InheritanceCycleError extends Error {
  constructor(public readonly chain: string[], public readonly statusCode: number = 422) {
    super(`Inheritance cycle: ${chain.join(' -> ')}`);
    this.name = 'InheritanceCycleError';
  }
}

export class YamlParseError extends Error {
  constructor(public readonly file: string, detail: string, public readonly statusCode: number = 400) {
    super(`${file}: ${detail}`);
    this.name = 'YamlParseError';
  }
}

export class UsageError extends Error {
  constructor(message: string, public readonly statusCode: number = 400) {
    super(message);
    this.name = 'UsageError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly statusCode: number = 400) {
    super(message);
    this.name = 'ConfigError';
  }
}
