/**
 * Runtime narrowing helpers for values that arrive as `unknown`
 * (parsed YAML, HTTP response bodies, request payloads).
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/** Read a string or number field as a string; anything else is undefined. */
export function readKey(source: Record<string, unknown>, field: string): string | undefined {
  const value = source[field];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}
