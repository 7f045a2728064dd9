/**
 * Parse a JSON column that is expected to hold an object; anything else yields null
 */
export function parseJsonObject(raw: string | null): Record<string, unknown> | null {
  if (!raw) return null;
  const parsed: unknown = JSON.parse(raw);
  return isPlainObject(parsed) ? parsed : null;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
