import { getDomain, parse } from 'tldts';

const HOST_PATTERN =
  /^(?=.{1,253}$)(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,63}$/;

/**
 * True for a bare lowercase host such as `stripe.com` or `jobs.stripe.com`.
 */
export function isBareHost(value: string): boolean {
  return HOST_PATTERN.test(value);
}

/**
 * Reduces user input (`https://www.Stripe.com/jobs`, `stripe.com.`) to the
 * registrable domain. Returns null when nothing usable remains.
 */
export function normalizeDomain(input: string): string | null {
  const trimmed = input.trim().toLowerCase().replace(/\.$/, '');
  if (!trimmed) return null;

  const host = parse(trimmed).hostname;
  if (!host || !isBareHost(host)) return null;

  return getDomain(host) ?? host;
}

export function registrableDomain(urlOrHost: string): string | null {
  const domain = getDomain(urlOrHost.toLowerCase());
  return domain ? domain : null;
}

export function sameRegistrableDomain(url: string, domain: string): boolean {
  return registrableDomain(url) === domain;
}

/**
 * Canonical form used for visited-set membership: fragment dropped,
 * host lowercased, trailing slash trimmed (except on the root path).
 */
export function normalizeUrl(raw: string, base?: string): string | null {
  let url: URL;
  try {
    url = base ? new URL(raw, base) : new URL(raw);
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;

  url.hash = '';
  url.hostname = url.hostname.toLowerCase();
  let href = url.toString();
  if (url.pathname !== '/' && href.endsWith('/') && !url.search) {
    href = href.slice(0, -1);
  }
  if (url.pathname === '/' && !url.search) {
    href = `${url.protocol}//${url.host}`;
  }
  return href;
}

export function normalizeOrganizationName(name: string): string {
  return name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Identity key of an organization: its registrable domain when known,
 * else its normalized name with a `name:` prefix so the two never collide.
 */
export function organizationKey(name: string, domain?: string | null): string {
  if (domain) return domain.toLowerCase();
  return `name:${normalizeOrganizationName(name)}`;
}
