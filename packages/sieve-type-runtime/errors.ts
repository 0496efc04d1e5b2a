// packages/sieve-type-runtime/errors.ts
// Configuration errors: mistakes in a schema or its options, never in the data.
// These are thrown; data failures are returned as Err outcomes.

/** Location of a spec node inside the root spec, e.g. `keys[1].type.alternatives[0]`. */
export type SpecLocation = string;

export class SchemaConfigurationError extends Error {
  readonly location: SpecLocation;

  constructor(message: string, location: SpecLocation = "") {
    super(location ? `${message} (at ${location})` : message);
    this.name = "SchemaConfigurationError";
    this.location = location;
  }
}

export class MalformedSpecError extends SchemaConfigurationError {
  constructor(message: string, location: SpecLocation = "") {
    super(message, location);
    this.name = "MalformedSpecError";
  }
}

export class UnknownPredicateError extends SchemaConfigurationError {
  readonly predicate: string;

  constructor(predicate: string, location: SpecLocation = "") {
    super(`unknown predicate ${JSON.stringify(predicate)}`, location);
    this.name = "UnknownPredicateError";
    this.predicate = predicate;
  }
}

export class InvalidOptionsError extends SchemaConfigurationError {
  readonly option: string;

  constructor(option: string, message: string) {
    super(`invalid option ${JSON.stringify(option)}: ${message}`);
    this.name = "InvalidOptionsError";
    this.option = option;
  }
}
