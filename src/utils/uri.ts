/** Internal device key that must never leave the process. */
export const RESERVED_KEY = 'thread_id';

export function withoutReservedKey(mapping: Record<string, string>): Record<string, string> {
  const { [RESERVED_KEY]: _dropped, ...rest } = mapping;
  return rest;
}

/**
 * Builds a query string from `mapping`, e.g. `{ msg: 'a b', code: '10' }`
 * becomes `?msg=a%20b&code=10&`. Every pair is followed by `&`, so callers
 * may append further literal parameters directly.
 */
export function encodeUriPayload(mapping: Record<string, string | number>): string {
  let uri = '?';
  for (const [key, value] of Object.entries(mapping)) {
    if (key === RESERVED_KEY) continue;
    uri += `${key}=${encodeURIComponent(String(value))}&`;
  }
  return uri;
}
