const LOCAL_HOSTS = new Set(['localhost', '127.0.0.1']);

/** Outside production any localhost origin is accepted regardless of port. */
export function isAllowedOrigin(origin: string, allowed: readonly string[], production: boolean): boolean {
  if (allowed.includes('*') || allowed.includes(origin)) return true;
  if (production) return false;
  try {
    return LOCAL_HOSTS.has(new URL(origin).hostname);
  } catch {
    return false;
  }
}
