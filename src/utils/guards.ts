/**
 * Type guards shared across modules
 */

/**
 * Plain JSON-style object (not null, not an array)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
