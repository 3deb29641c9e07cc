import { Attributes, Board } from "../types";
import { ConfigurationError } from "../errors";

export function requireString(attributes: Attributes, key: string): string {
  const value = attributes[key];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ConfigurationError(`'${key}' attribute is required in config`);
  }
  return value.trim();
}

/**
 * Reads an optional attribute that must be a number greater than 0 when set.
 * Numeric strings are accepted, since environment-sourced configs carry
 * everything as text.
 */
export function optionalPositiveNumber(
  attributes: Attributes,
  key: string
): number | undefined {
  const value = attributes[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string" && value.trim().length > 0
        ? Number(value)
        : NaN;

  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`'${key}' must be a number`);
  }
  if (parsed <= 0) {
    throw new ConfigurationError(`'${key}' must be greater than 0`);
  }
  return parsed;
}

export function resolveBoard(
  dependencies: ReadonlyMap<string, Board>,
  name: string
): Board {
  const board = dependencies.get(name);
  if (!board) {
    throw new ConfigurationError(`board dependency "${name}" was not provided`);
  }
  return board;
}
