import process from "node:process";

/**
 * Typed readers for environment variables. Every helper accepts an optional
 * {@link EnvSource} so the option parser and the tests can work against a
 * plain record instead of mutating `process.env`.
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;

const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Trims the raw value and collapses blank strings to `undefined`. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Returns an optional boolean if {@link name} is set to a recognised literal. */
export function readOptionalBool(name: string, env: EnvSource = process.env): boolean | undefined {
  const normalised = normaliseEnvValue(env[name])?.toLowerCase();
  if (!normalised) {
    return undefined;
  }
  if (TRUE_LITERALS.has(normalised)) {
    return true;
  }
  if (FALSE_LITERALS.has(normalised)) {
    return false;
  }
  return undefined;
}

export function readBool(name: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  return readOptionalBool(name, env) ?? defaultValue;
}

export interface IntegerBounds {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

/**
 * Returns an integer when {@link name} holds a base-10 literal inside the
 * bounds. Values outside the safe integer range are treated as unset.
 */
export function readOptionalInt(
  name: string,
  bounds: IntegerBounds = {},
  env: EnvSource = process.env,
): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  if (bounds.min !== undefined && value < bounds.min) {
    return undefined;
  }
  if (bounds.max !== undefined && value > bounds.max) {
    return undefined;
  }
  return value;
}

export function readInt(
  name: string,
  defaultValue: number,
  bounds: IntegerBounds = {},
  env: EnvSource = process.env,
): number {
  return readOptionalInt(name, bounds, env) ?? defaultValue;
}

/** Returns the trimmed value of {@link name}, or `undefined` when blank. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

export function readString(name: string, defaultValue: string, env: EnvSource = process.env): string {
  return readOptionalString(name, env) ?? defaultValue;
}

/**
 * Reads an enum-like variable. Matching is case-insensitive and the canonical
 * spelling from {@link allowed} is returned.
 */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: EnvSource = process.env,
): T | undefined {
  const normalised = normaliseEnvValue(env[name])?.toLowerCase();
  if (!normalised) {
    return undefined;
  }
  return allowed.find((candidate) => candidate.toLowerCase() === normalised);
}

export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: EnvSource = process.env,
): T {
  return readOptionalEnum(name, allowed, env) ?? defaultValue;
}
