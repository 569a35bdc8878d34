import { OriginNotAllowedError } from '@chatrouter/core';

export interface RequestOrigin {
  origin?: string | null;
  referer?: string | null;
}

/**
 * Reduce an allowlist entry to a bare lowercase hostname, keeping a leading
 * `*.` wildcard. Entries may be written as URLs or with a port.
 */
export function normalizeDomain(entry: string): string | null {
  let value = entry.trim().toLowerCase();
  if (value.length === 0) return null;

  const wildcard = value.startsWith('*.');
  if (wildcard) value = value.slice(2);

  if (value.includes('://')) {
    const host = hostnameOf(value);
    if (host === null) return null;
    value = host;
  } else {
    value = value.split('/')[0] ?? '';
    value = value.split(':')[0] ?? '';
  }

  if (value.length === 0) return null;
  return wildcard ? `*.${value}` : value;
}

export function normalizeAllowedDomains(entries: readonly string[]): string[] {
  const normalized = entries
    .map((entry) => normalizeDomain(entry))
    .filter((entry): entry is string => entry !== null);
  return [...new Set(normalized)];
}

function hostnameOf(url: string): string | null {
  try {
    const hostname = new URL(url).hostname.toLowerCase();
    return hostname.length > 0 ? hostname : null;
  } catch {
    return null;
  }
}

/**
 * Host the widget is embedded on: the `Origin` header, else the `Referer`
 */
export function requestHost(request: RequestOrigin): string | null {
  if (request.origin) {
    const host = hostnameOf(request.origin);
    if (host !== null) return host;
  }
  if (request.referer) {
    return hostnameOf(request.referer);
  }
  return null;
}

export function hostMatches(host: string, domain: string): boolean {
  if (domain.startsWith('*.')) {
    // Wildcards cover subdomains only, never the apex
    return host.endsWith(domain.slice(1));
  }
  return host === domain;
}

/**
 * An empty allowlist admits every origin; otherwise the request must carry
 * an Origin or Referer whose host matches an entry
 */
export function isOriginAllowed(allowedDomains: readonly string[], request: RequestOrigin): boolean {
  const domains = normalizeAllowedDomains(allowedDomains);
  if (domains.length === 0) return true;

  const host = requestHost(request);
  if (host === null) return false;

  return domains.some((domain) => hostMatches(host, domain));
}

/**
 * @throws OriginNotAllowedError
 */
export function assertOriginAllowed(
  allowedDomains: readonly string[],
  request: RequestOrigin
): void {
  if (!isOriginAllowed(allowedDomains, request)) {
    throw new OriginNotAllowedError();
  }
}
