/**
 * Base class for errors raised before any hardware is touched.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * A component configuration is missing a required attribute, carries an
 * out-of-range value, or names a dependency that was not provided.
 */
export class ConfigurationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * An operation was called with an argument outside its domain.
 */
export class InvalidArgumentError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export class ResourceClosedError extends Error {
  constructor(name: string) {
    super(`Resource "${name}" is closed`);
    this.name = "ResourceClosedError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
