/**
 * Environment variable readers.
 *
 * Each reader takes the variable source as its last argument so callers
 * can read from something other than process.env. Empty strings count as
 * unset.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type EnvSource = Readonly<Record<string, string | undefined>>;

function read(source: EnvSource, key: string): string | undefined {
  const value = source[key];
  return value === undefined || value === "" ? undefined : value;
}

export function optionalEnv(
  key: string,
  defaultValue: string,
  source: EnvSource = process.env
): string {
  return read(source, key) ?? defaultValue;
}

/**
 * Read a non-negative integer, such as a duration in milliseconds.
 */
export function optionalEnvInt(
  key: string,
  defaultValue: number,
  source: EnvSource = process.env
): number {
  const value = read(source, key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(
      `Environment variable ${key} must be a non-negative integer, got: ${value}`
    );
  }
  return parsed;
}

const TRUE_VALUES: readonly string[] = ["true", "1", "yes"];
const FALSE_VALUES: readonly string[] = ["false", "0", "no"];

/**
 * Recognizes true/false, 1/0 and yes/no in any case.
 */
export function optionalEnvBool(
  key: string,
  defaultValue: boolean,
  source: EnvSource = process.env
): boolean {
  const value = read(source, key);
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (TRUE_VALUES.includes(normalized)) {
    return true;
  }
  if (FALSE_VALUES.includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`
  );
}
