import { InvalidInputError } from '../common/errors';
import { isBareHost } from '../common/domain.utils';

interface NameParts {
  first: string;
  last: string;
}

interface EmailPattern {
  name: string;
  needsLast: boolean;
  build: (parts: NameParts) => string;
}

/**
 * Local-part conventions, most common first. The position in this list is
 * the conventionality signal used by the scorer.
 */
export const EMAIL_PATTERNS: readonly EmailPattern[] = [
  { name: 'first.last', needsLast: true, build: ({ first, last }) => `${first}.${last}` },
  { name: 'flast', needsLast: true, build: ({ first, last }) => `${first[0]}${last}` },
  { name: 'firstlast', needsLast: true, build: ({ first, last }) => `${first}${last}` },
  { name: 'first_last', needsLast: true, build: ({ first, last }) => `${first}_${last}` },
  { name: 'first.l', needsLast: true, build: ({ first, last }) => `${first}.${last[0]}` },
  { name: 'firstl', needsLast: true, build: ({ first, last }) => `${first}${last[0]}` },
  { name: 'first', needsLast: false, build: ({ first }) => first },
  { name: 'f.last', needsLast: true, build: ({ first, last }) => `${first[0]}.${last}` },
  { name: 'first-last', needsLast: true, build: ({ first, last }) => `${first}-${last}` },
  { name: 'last.first', needsLast: true, build: ({ first, last }) => `${last}.${first}` },
];

export interface GeneratedAddress {
  address: string;
  pattern: string;
  patternIndex: number;
}

function cleanToken(token: string): string {
  return token
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z]/g, '');
}

export function splitName(name: string): NameParts {
  const tokens = name.split(/\s+/).map(cleanToken).filter(Boolean);
  if (tokens.length === 0) {
    throw new InvalidInputError(`Name "${name}" has no usable letters`, 'name');
  }
  return {
    first: tokens[0],
    last: tokens.length > 1 ? tokens[tokens.length - 1] : '',
  };
}

/**
 * Pure and deterministic: the same (name, domain) always yields the same
 * ordered, duplicate-free list.
 */
export class PatternGenerator {
  generate(name: string, domain: string): string[] {
    return this.generateCandidates(name, domain).map((c) => c.address);
  }

  generateCandidates(name: string, domain: string): GeneratedAddress[] {
    const host = domain.trim().toLowerCase();
    if (!isBareHost(host)) {
      throw new InvalidInputError(`Domain "${domain}" is not a bare host`, 'domain');
    }
    const parts = splitName(name);

    const seen = new Set<string>();
    const generated: GeneratedAddress[] = [];
    EMAIL_PATTERNS.forEach((pattern, patternIndex) => {
      if (pattern.needsLast && !parts.last) return;
      const address = `${pattern.build(parts)}@${host}`;
      if (seen.has(address)) return;
      seen.add(address);
      generated.push({ address, pattern: pattern.name, patternIndex });
    });
    return generated;
  }

  get patternCount(): number {
    return EMAIL_PATTERNS.length;
  }
}
