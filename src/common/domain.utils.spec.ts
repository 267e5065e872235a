import {
  isBareHost,
  normalizeDomain,
  normalizeOrganizationName,
  normalizeUrl,
  organizationKey,
  sameRegistrableDomain,
} from './domain.utils';

describe('domain utils', () => {
  describe('normalizeDomain', () => {
    it.each([
      ['stripe.com', 'stripe.com'],
      ['https://www.Stripe.com/jobs', 'stripe.com'],
      ['jobs.stripe.com', 'stripe.com'],
      ['stripe.com.', 'stripe.com'],
      ['acme.co.uk', 'acme.co.uk'],
    ])('should reduce %s to %s', (input, expected) => {
      expect(normalizeDomain(input)).toBe(expected);
    });

    it.each(['', '   ', 'not a domain', 'localhost'])('should reject %p', (input) => {
      expect(normalizeDomain(input)).toBeNull();
    });
  });

  it('should recognise bare hosts only', () => {
    expect(isBareHost('stripe.com')).toBe(true);
    expect(isBareHost('https://stripe.com')).toBe(false);
    expect(isBareHost('Stripe.com')).toBe(false);
  });

  it('should compare registrable domains', () => {
    expect(sameRegistrableDomain('https://jobs.stripe.com/open', 'stripe.com')).toBe(true);
    expect(sameRegistrableDomain('https://stripe.dev', 'stripe.com')).toBe(false);
  });

  describe('normalizeUrl', () => {
    it('should drop fragments and trailing slashes', () => {
      expect(normalizeUrl('https://Example.com/team/#amy')).toBe('https://example.com/team');
      expect(normalizeUrl('https://example.com/')).toBe('https://example.com');
    });

    it('should resolve relative links against a base', () => {
      expect(normalizeUrl('../jobs', 'https://example.com/about/team')).toBe(
        'https://example.com/jobs',
      );
    });

    it('should keep query strings', () => {
      expect(normalizeUrl('https://example.com/jobs?page=2')).toBe(
        'https://example.com/jobs?page=2',
      );
    });

    it('should reject non-http schemes and garbage', () => {
      expect(normalizeUrl('javascript:void(0)')).toBeNull();
      expect(normalizeUrl('ftp://example.com/file')).toBeNull();
      expect(normalizeUrl('not a url')).toBeNull();
    });
  });

  it('should key organizations by domain, else by normalized name', () => {
    expect(organizationKey('Stripe', 'stripe.com')).toBe('stripe.com');
    expect(organizationKey('  Café Lumière, Inc. ')).toBe('name:cafe lumiere inc');
    expect(normalizeOrganizationName('ACME   Rockets!')).toBe('acme rockets');
  });
});
