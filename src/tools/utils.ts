/**
 * Shared utilities for tool handlers.
 *
 * Tool input arrives as whatever JSON the model produced, so every read
 * narrows the value instead of trusting the declared schema.
 */

/**
 * Read a string field. Non-strings count as absent; empty strings are
 * returned as-is unless `trim` is set.
 */
export function readString(
  input: Record<string, unknown>,
  key: string,
  options: { trim?: boolean } = {}
): string | undefined {
  const value = input[key];
  if (typeof value !== 'string') return undefined;
  if (!options.trim) return value;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Read an integer field. Accepts numbers and numeric strings ("3"), since
 * models sometimes quote numbers.
 */
export function readInteger(input: Record<string, unknown>, key: string): number | undefined {
  const value = input[key];
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : undefined;
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    return parseInt(value.trim(), 10);
  }
  return undefined;
}
