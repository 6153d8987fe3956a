import { SchemaEvolutionError } from "./errors";

/**
 * How a decoder treats a structured value whose encoded field count differs
 * from the count its current shape declares.
 *
 * - NONE: counts must match.
 * - BACKWARDS: older data with fewer fields is accepted through a fallback
 *   constructor.
 * - FORWARDS: newer data with more fields is accepted; the extra trailing
 *   fields are read and dropped.
 * - ALL: both directions.
 */
export enum CompatibilityMode {
  NONE = "NONE",
  BACKWARDS = "BACKWARDS",
  FORWARDS = "FORWARDS",
  ALL = "ALL",
}

const MODES: ReadonlySet<string> = new Set(Object.values(CompatibilityMode));

/**
 * Returns true if `value` names a compatibility mode.
 */
export function isCompatibilityMode(value: string): value is CompatibilityMode {
  return MODES.has(value);
}

/**
 * Returns true if `mode` tolerates encoded data with fewer fields.
 */
export function acceptsFewerFields(mode: CompatibilityMode): boolean {
  return mode === CompatibilityMode.BACKWARDS || mode === CompatibilityMode.ALL;
}

/**
 * Returns true if `mode` tolerates encoded data with more fields.
 */
export function acceptsMoreFields(mode: CompatibilityMode): boolean {
  return mode === CompatibilityMode.FORWARDS || mode === CompatibilityMode.ALL;
}

/**
 * Checks an encoded field count against the declared one.
 *
 * Returns the error to throw, or null when `mode` permits the combination.
 * Has no side effects.
 */
export function validateFieldCount(
  mode: CompatibilityMode,
  declared: number,
  encoded: number
): SchemaEvolutionError | null {
  if (encoded === declared) {
    return null;
  }
  if (encoded < declared) {
    if (acceptsFewerFields(mode)) {
      return null;
    }
    return new SchemaEvolutionError(
      mode,
      `Compatibility mode ${mode} does not accept ${encoded} encoded fields ` +
        `where ${declared} are declared (fewer fields require BACKWARDS or ALL)`,
      declared,
      encoded
    );
  }
  if (acceptsMoreFields(mode)) {
    return null;
  }
  return new SchemaEvolutionError(
    mode,
    `Compatibility mode ${mode} does not accept ${encoded} encoded fields ` +
      `where ${declared} are declared (extra fields require FORWARDS or ALL)`,
    declared,
    encoded
  );
}
