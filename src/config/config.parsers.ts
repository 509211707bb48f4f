import { BOOLEAN_TRUE_VALUES, ReputationStrategy } from './config.constants';

export function parseOptionalBoolean(value: string | undefined, defaultValue = false): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (BOOLEAN_TRUE_VALUES.includes(normalized)) {
    return true;
  }

  if (normalized === 'false' || normalized === '0') {
    return false;
  }

  return defaultValue;
}

export function parseNumberWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric value: "${value}" (must be a non-negative finite number)`);
  }

  // Counts, intervals and retention windows are whole numbers
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric value: "${value}" (must be an integer)`);
  }

  return parsed;
}

/**
 * Parses a string environment variable with a default value.
 *
 * @param value - The string value to parse
 * @param defaultValue - The default value to return if not provided
 * @returns The value or default
 */
export function parseStringWithDefault(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value;
}

/**
 * Parses the reputation strategy name.
 *
 * Matching is case-insensitive and ignores surrounding whitespace.
 *
 * @throws {Error} If the value names no known strategy
 * @example
 * ```
 * parseStrategy('Incremental') // ReputationStrategy.INCREMENTAL
 * ```
 */
export function parseStrategy(value: string | undefined, defaultValue: ReputationStrategy): ReputationStrategy {
  if (value === undefined || !value.trim()) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  const match = Object.values(ReputationStrategy).find((strategy) => strategy === normalized);

  if (!match) {
    throw new Error(
      `Invalid REPUTATION_STRATEGY: "${value}". Allowed values: ${Object.values(ReputationStrategy).join(', ')}`,
    );
  }

  return match;
}
