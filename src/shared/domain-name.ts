// ──────────────────────────────────────────
// Domain-name normalization: applied before every domain comparison
// ──────────────────────────────────────────

/**
 * Reduces a URL or host string to a bare lowercase host:
 * `HTTPS://User@Www.Example.com:443/path?q#x` → `www.example.com`.
 */
export function normalizeDomain(input: string): string {
  let host = input.trim().toLowerCase();
  host = host.replace(/^[a-z][a-z0-9+.-]*:\/\//, '');
  host = host.replace(/^\/\//, '');
  host = host.split(/[/?#]/, 1)[0] ?? '';
  const at = host.lastIndexOf('@');
  if (at >= 0) host = host.slice(at + 1);
  host = host.replace(/:\d*$/, '');
  return host.replace(/\.+$/, '');
}

export function stripWww(domain: string): string | null {
  return domain.startsWith('www.') ? domain.slice(4) : null;
}
