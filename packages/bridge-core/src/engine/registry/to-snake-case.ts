const WORD_START_PATTERN = /(.)([A-Z][a-z]+)/g;
const CASE_BOUNDARY_PATTERN = /([a-z0-9])([A-Z])/g;

/**
 * `ManageAsset` → `manage_asset`, `HTTPServer` → `http_server`,
 * `getHTTPResponse2Code` → `get_http_response2_code`.
 */
export function toSnakeCase(name: string): string {
  if (name === '') {
    return name;
  }

  return name
    .replace(WORD_START_PATTERN, '$1_$2')
    .replace(CASE_BOUNDARY_PATTERN, '$1_$2')
    .toLowerCase();
}
