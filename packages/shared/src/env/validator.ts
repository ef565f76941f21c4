import type { EnvService } from "./schema";
import { ENV_SCHEMAS } from "./schema";

export type EnvSource = Record<string, string | undefined>;

const PLACEHOLDER_PATTERNS = [/CHANGE_ME/i, /REPLACE_ME/i, /^<.*>$/];

export class EnvValidationError extends Error {
  constructor(service: EnvService, public readonly missing: string[]) {
    super(
      `[env] Missing required environment variables for ${service}: ${[...missing]
        .sort()
        .join(", ")}`
    );
    this.name = "EnvValidationError";
  }
}

function isUnset(value: string | undefined): boolean {
  if (value === undefined) {
    return true;
  }
  const trimmed = value.trim();
  if (!trimmed.length) {
    return true;
  }
  return PLACEHOLDER_PATTERNS.some(pattern => pattern.test(trimmed));
}

export function getMissingEnvVars(service: EnvService, source: EnvSource = process.env): string[] {
  const schema = ENV_SCHEMAS[service];
  return schema.required.filter(key => isUnset(source[key]));
}

export function assertEnvVars(service: EnvService, source: EnvSource = process.env): void {
  const missing = getMissingEnvVars(service, source);
  if (missing.length) {
    throw new EnvValidationError(service, missing);
  }
}

/**
 * Returns the trimmed value of an optional variable, or undefined when it is
 * unset, blank or still a template placeholder.
 */
export function readOptionalEnv(key: string, source: EnvSource = process.env): string | undefined {
  const value = source[key];
  return isUnset(value) ? undefined : value?.trim();
}

/** Splits a comma-separated variable ("P0, P1") into its non-empty parts. */
export function readListEnv(key: string, source: EnvSource = process.env): string[] | undefined {
  const value = readOptionalEnv(key, source);
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(",")
    .map(part => part.trim())
    .filter(part => part.length > 0);
}
