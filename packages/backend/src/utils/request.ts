/**
 * Narrow a parsed JSON body. `null`, arrays and primitives are all valid JSON.
 */
export function isJsonObject<T extends object>(value: T | null): value is T {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const NOT_AN_OBJECT_ERROR = 'Request body must be a JSON object';
