/**
 * Field parsers for the telemetry line format
 */

const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a decimal float field
 * @param field - Raw field text, surrounding whitespace allowed
 * @returns Parsed value, or null when the field is not a finite decimal
 */
export function parseFloatField(field: string): number | null {
  const text = field.trim();
  if (!FLOAT_PATTERN.test(text)) {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse an integer field
 * @param field - Raw field text, surrounding whitespace allowed
 * @returns Parsed value, or null when the field is not a plain integer
 */
export function parseIntegerField(field: string): number | null {
  const text = field.trim();
  if (!INTEGER_PATTERN.test(text)) {
    return null;
  }
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : null;
}
