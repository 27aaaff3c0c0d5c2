/**
 * Bare lookup key for a stored domain: lower-cased hostname without scheme,
 * port or a leading `www.`. Org-blocklist and equity rows are keyed this way.
 */
export function bareDomain(domain: string): string {
  const trimmed = domain.trim().toLowerCase()
  let host: string
  try {
    host = new URL(trimmed.includes('://') ? trimmed : `https://${trimmed}`).hostname
  } catch {
    host = trimmed
  }
  return host.startsWith('www.') ? host.slice(4) : host
}

export function hasSuffix(host: string, suffixes: readonly string[]): boolean {
  return suffixes.some((suffix) => host.endsWith(suffix))
}
