import functionalPrefixes from './data/functional-prefixes.json';
import junkLocalParts from './data/junk-local-parts.json';
import nameStopwords from './data/name-stopwords.json';
import {
  normalizeOrganizationName,
  organizationKey,
  registrableDomain,
} from '../common/domain.utils';
import {
  DEFAULT_RECRUITING_KEYWORDS,
  DEFAULT_ROLE_KEYWORDS,
} from '../config/configuration';
import type {
  Contact,
  ContactSource,
  ExtractedSignal,
  ExtractionResult,
  NamedContactSignal,
  Organization,
  RawEmailSignal,
} from './interfaces/discovery.types';

export interface SignalExtractorOptions {
  roleKeywords: string[];
  recruitingKeywords: string[];
  /** Max characters between a name and the nearest role keyword. */
  nameWindow: number;
}

const MAX_INPUT_LENGTH = 200_000;
const CONTEXT_RADIUS = 75;

const EMAIL_PATTERN = /[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/gi;
const NAME_PATTERN =
  /(?<![\p{L}'-])(?=(\p{Lu}\p{Ll}{1,15}(?:-\p{Lu}\p{Ll}{1,15})?)([ \t]+)(\p{Lu}\p{Ll}{1,15}(?:-\p{Lu}\p{Ll}{1,15})?)(?!\p{L}))/gu;
const SEGMENT_SPLIT = /\r?\n|[•·]|(?<=[.!?])\s+/;

const PERSONAL_LOCAL_PARTS = [
  /^[a-z]{2,}[._-][a-z]{2,}$/,
  /^[a-z][._-][a-z]{2,}$/,
  /^[a-z]{2,}[._-][a-z]$/,
  /^[a-z]{2,}[._-][a-z]{2,}[._-][a-z]+$/,
];

const ASSET_TLDS = new Set(['png', 'jpg', 'jpeg', 'gif', 'svg', 'webp', 'css', 'js', 'ico']);

const OBFUSCATIONS: Array<[RegExp, string]> = [
  [/\s*\[\s*at\s*\]\s*/gi, '@'],
  [/\s*\(\s*at\s*\)\s*/gi, '@'],
  [/\s*\{\s*at\s*\}\s*/gi, '@'],
  [/\s*\[\s*dot\s*\]\s*/gi, '.'],
  [/\s*\(\s*dot\s*\)\s*/gi, '.'],
  [/\s*\{\s*dot\s*\}\s*/gi, '.'],
  [/&#0*64;|&#x0*40;|&commat;/gi, '@'],
  [/&#0*46;|&#x0*2e;|&period;/gi, '.'],
];

const FUNCTIONAL = new Set<string>(functionalPrefixes);
const JUNK = new Set<string>(junkLocalParts);
const STOPWORDS = new Set<string>(nameStopwords);

interface KeywordHit {
  keyword: string;
  start: number;
  end: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function collapse(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function deobfuscate(text: string): string {
  return OBFUSCATIONS.reduce(
    (current, [pattern, replacement]) => current.replace(pattern, replacement),
    text,
  );
}

export function isFunctionalLocalPart(localPart: string): boolean {
  const lp = localPart.toLowerCase();
  if (FUNCTIONAL.has(lp)) return true;
  const head = lp.split(/[._+\-0-9]/)[0];
  return head !== lp && FUNCTIONAL.has(head);
}

export function isPersonalLocalPart(localPart: string): boolean {
  const lp = localPart.toLowerCase();
  return !isFunctionalLocalPart(lp) && PERSONAL_LOCAL_PARTS.some((p) => p.test(lp));
}

function isUsableLocalPart(localPart: string): boolean {
  if (localPart.length < 2 || localPart.length > 64) return false;
  if (JUNK.has(localPart)) return false;
  if (localPart.includes('www') || localPart.includes('http')) return false;
  if (!/^[a-z]/.test(localPart)) return false;
  if (/[._-]$/.test(localPart) || /\.\.|__|--/.test(localPart)) return false;
  return true;
}

/**
 * Matches any keyword starting at a letter boundary. Keywords of four or
 * more letters also match as word stems ("recruit" in "Recruiter"); shorter
 * ones ("hr") only as whole words, so "Chrome" or "shreya" never match.
 * Email separators (`.`, `_`, `+`, `-`) are boundaries.
 */
export function keywordStemPattern(keywords: string[]): RegExp | null {
  if (!keywords.length) return null;
  const sorted = [...keywords].sort((a, b) => b.length - a.length);
  const stems = sorted.filter((k) => k.length >= 4).map(escapeRegExp);
  const words = sorted.filter((k) => k.length < 4).map(escapeRegExp);
  const alternatives = [
    ...(stems.length ? [`(?:${stems.join('|')})`] : []),
    ...(words.length ? [`(?:${words.join('|')})s?(?!\\p{L})`] : []),
  ];
  return new RegExp(`(?<!\\p{L})(?:${alternatives.join('|')})`, 'iu');
}

/**
 * Pulls named contacts and raw email addresses out of unstructured text
 * (search snippets, crawled pages). Never throws: text with nothing
 * recognisable yields empty results.
 */
export class SignalExtractor {
  private readonly roleKeywords: string[];
  private readonly recruitingKeywords: string[];
  private readonly nameWindow: number;
  private readonly keywordPattern: RegExp | null;
  private readonly recruitingPattern: RegExp | null;

  constructor(options: Partial<SignalExtractorOptions> = {}) {
    this.roleKeywords = (options.roleKeywords ?? DEFAULT_ROLE_KEYWORDS).map((k) =>
      k.toLowerCase(),
    );
    this.recruitingKeywords = (
      options.recruitingKeywords ?? DEFAULT_RECRUITING_KEYWORDS
    ).map((k) => k.toLowerCase());
    this.nameWindow = options.nameWindow ?? 80;

    const alternatives = [...this.roleKeywords]
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp);
    this.keywordPattern = alternatives.length
      ? new RegExp(`(?<!\\p{L})(?:${alternatives.join('|')})s?(?!\\p{L})`, 'giu')
      : null;
    this.recruitingPattern = keywordStemPattern(this.recruitingKeywords);
  }

  extract(
    rawText: string,
    organization: Organization,
    source: ContactSource,
    sourceUrl?: string,
  ): ExtractionResult {
    const signals = this.extractSignals(rawText, organization, source, sourceUrl);
    const result: ExtractionResult = { contacts: [], emails: [] };
    for (const signal of signals) {
      if (signal.kind === 'named_contact') {
        result.contacts.push(signal.contact);
      } else {
        result.emails.push(signal);
      }
    }
    return result;
  }

  extractSignals(
    rawText: string,
    organization: Organization,
    source: ContactSource,
    sourceUrl?: string,
  ): ExtractedSignal[] {
    if (!rawText || !rawText.trim()) return [];
    const text = deobfuscate(rawText.slice(0, MAX_INPUT_LENGTH));

    return [
      ...this.findContacts(text, organization, source, sourceUrl),
      ...this.findEmails(text, organization, sourceUrl),
    ];
  }

  /** Role relevance in 0..1: recruiting titles 1, other roles 0.5. */
  roleRelevance(text: string | undefined): number {
    if (!text) return 0;
    if (this.recruitingPattern?.test(text)) return 1;
    if (this.findKeywords(text).length > 0) return 0.5;
    return 0;
  }

  private findKeywords(segment: string): KeywordHit[] {
    if (!this.keywordPattern) return [];
    return Array.from(segment.matchAll(this.keywordPattern), (m) => ({
      keyword: m[0],
      start: m.index ?? 0,
      end: (m.index ?? 0) + m[0].length,
    }));
  }

  private findContacts(
    text: string,
    organization: Organization,
    source: ContactSource,
    sourceUrl?: string,
  ): NamedContactSignal[] {
    const orgKey = organizationKey(organization.name, organization.domain);
    const orgTokens = new Set(
      normalizeOrganizationName(organization.name).split(' ').filter(Boolean),
    );
    const byName = new Map<string, NamedContactSignal>();

    for (const segment of text.split(SEGMENT_SPLIT)) {
      const hits = this.findKeywords(segment);
      if (hits.length === 0) continue;

      let consumedUntil = -1;
      for (const match of segment.matchAll(NAME_PATTERN)) {
        const start = match.index ?? 0;
        if (start < consumedUntil) continue;
        const [, first, gap, last] = match;
        const end = start + first.length + gap.length + last.length;

        if (!this.isPlausibleName(first, last, orgTokens)) continue;
        const distance = Math.min(
          ...hits.map((hit) =>
            hit.start >= end ? hit.start - end : hit.end <= start ? start - hit.end : 0,
          ),
        );
        if (distance > this.nameWindow) continue;
        consumedUntil = end;

        const title = this.titleFor(segment, start, end, hits);
        const fullName = `${first} ${last}`;
        const key = fullName.toLowerCase();
        const existing = byName.get(key);
        if (existing && (existing.contact.title || !title)) continue;

        const contact: Contact = {
          fullName,
          firstName: first,
          lastName: last,
          title,
          organizationKey: orgKey,
          source,
          sourceUrl,
        };
        byName.set(key, {
          kind: 'named_contact',
          contact,
          confidence: this.roleRelevance(title) === 1 ? 'high' : 'medium',
        });
      }
    }

    return [...byName.values()];
  }

  private isPlausibleName(first: string, last: string, orgTokens: Set<string>): boolean {
    const tokens = [first.toLowerCase(), last.toLowerCase()];
    if (tokens[0] === tokens[1]) return false;
    return tokens.every(
      (token) =>
        !STOPWORDS.has(token) &&
        !orgTokens.has(token) &&
        !this.roleKeywords.some((k) => token === k || token === `${k}s`),
    );
  }

  private titleFor(
    segment: string,
    start: number,
    end: number,
    hits: KeywordHit[],
  ): string | undefined {
    const after = segment.slice(end).match(/^[\s,:\-–—(]*([^,|;()]+)/);
    if (after) {
      const phrase = collapse(after[1].split(/\s+(?:at|@|-|–|—)\s+/i)[0]);
      if (phrase && this.findKeywords(phrase).length > 0) {
        return phrase.slice(0, 80);
      }
    }

    const before = segment.slice(0, start).match(/([^,|;()]+?)[\s,:\-–—]*$/);
    if (before) {
      const words = collapse(before[1]).split(' ').slice(-4);
      while (
        words.length > 0 &&
        /^\p{Ll}/u.test(words[0]) &&
        this.findKeywords(words[0]).length === 0
      ) {
        words.shift();
      }
      const phrase = words.join(' ');
      if (phrase && this.findKeywords(phrase).length > 0) {
        return phrase.slice(0, 80);
      }
    }

    const nearest = [...hits].sort(
      (a, b) => Math.abs(a.start - start) - Math.abs(b.start - start),
    )[0];
    if (!nearest) return undefined;
    return nearest.keyword.charAt(0).toUpperCase() + nearest.keyword.slice(1);
  }

  private findEmails(
    text: string,
    organization: Organization,
    sourceUrl?: string,
  ): RawEmailSignal[] {
    const orgDomain = organization.domain ? registrableDomain(organization.domain) : null;
    const seen = new Set<string>();
    const emails: RawEmailSignal[] = [];

    for (const match of text.matchAll(EMAIL_PATTERN)) {
      const address = match[0].toLowerCase().replace(/^[._%+-]+/, '');
      const at = address.indexOf('@');
      const localPart = address.slice(0, at);
      const host = address.slice(at + 1);
      const tld = host.slice(host.lastIndexOf('.') + 1);

      if (seen.has(address)) continue;
      if (ASSET_TLDS.has(tld) || !isUsableLocalPart(localPart)) continue;
      if (orgDomain && registrableDomain(host) !== orgDomain) continue;
      seen.add(address);

      const index = match.index ?? 0;
      const context = collapse(
        text.slice(
          Math.max(0, index - CONTEXT_RADIUS),
          index + match[0].length + CONTEXT_RADIUS,
        ),
      );
      const functional = isFunctionalLocalPart(localPart);
      const personal = !functional && isPersonalLocalPart(localPart);

      emails.push({
        kind: 'raw_email',
        address,
        context,
        sourceUrl,
        personal,
        functional,
        confidence: personal ? 'high' : functional ? 'low' : 'medium',
      });
    }

    return emails;
  }
}
