/**
 * Accepts only a single JSON object or array. Bare scalars (`"ping"`, `42`,
 * `true`) are not command payloads.
 */
export function isValidJson(text: string): boolean {
  const trimmed = text.trim();
  if (trimmed === '') {
    return false;
  }

  const isObject = trimmed.startsWith('{') && trimmed.endsWith('}');
  const isArray = trimmed.startsWith('[') && trimmed.endsWith(']');
  if (!(isObject || isArray)) {
    return false;
  }

  try {
    JSON.parse(trimmed);
    return true;
  } catch {
    return false;
  }
}
