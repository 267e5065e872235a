import type { ScoringWeights } from '../config/configuration';
import contextKeywords from './data/context-keywords.json';
import { EMAIL_PATTERNS } from './pattern-generator';
import { keywordStemPattern } from './signal-extractor';
import type {
  CandidateSelection,
  EmailCandidate,
  ScoredCandidate,
  VerificationStatus,
} from './interfaces/discovery.types';

export interface CandidateScorerOptions {
  weights: Partial<ScoringWeights>;
  /** Scores a title or local part for role relevance in 0..1. */
  roleRelevance: (text: string | undefined) => number;
}

const DEFAULT_WEIGHTS: ScoringWeights = {
  observed: 10,
  conventionality: 5,
  role: 3,
  functionalPenalty: 4,
  context: 3,
  url: 2,
};

const POSITIVE_CONTEXT = keywordStemPattern(contextKeywords.positive);
const NEGATIVE_CONTEXT = keywordStemPattern(contextKeywords.negative);
const CAREERS_URL = keywordStemPattern(contextKeywords.url);

/** +1 for recruiting words around an address, -1 for off-topic ones, 0 for both or neither. */
function contextSignal(context: string | undefined): number {
  if (!context) return 0;
  return (
    (POSITIVE_CONTEXT?.test(context) ? 1 : 0) - (NEGATIVE_CONTEXT?.test(context) ? 1 : 0)
  );
}

function isCareersUrl(url: string | undefined): boolean {
  return url ? (CAREERS_URL?.test(url) ?? false) : false;
}

const BACKUP_RATIO = 0.8;

function tier(verification: VerificationStatus | undefined): number {
  return verification === 'valid' ? 1 : 0;
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Ranks candidate addresses for one organization.
 *
 * Order is total and deterministic: verified-valid first, then score
 * descending, then address ascending. Addresses verified invalid are
 * dropped. Scoring an already scored list returns the same order.
 */
export class CandidateScorer {
  private readonly weights: ScoringWeights;
  private readonly roleRelevance: (text: string | undefined) => number;

  constructor(options: Partial<CandidateScorerOptions> = {}) {
    this.weights = { ...DEFAULT_WEIGHTS, ...options.weights };
    this.roleRelevance = options.roleRelevance ?? (() => 0);
  }

  score(candidates: EmailCandidate[]): ScoredCandidate[] {
    const merged = new Map<string, ScoredCandidate>();

    for (const candidate of candidates) {
      if (candidate.verification === 'invalid') continue;
      const scored = this.scoreOne(candidate);
      const existing = merged.get(scored.address);
      if (!existing) {
        merged.set(scored.address, scored);
        continue;
      }

      // Same address from two origins: the better one wins and inherits
      // whatever the other knew about the person behind it.
      const [winner, loser] =
        this.compare(scored, existing) < 0 ? [scored, existing] : [existing, scored];
      merged.set(
        scored.address,
        this.scoreOne({
          ...winner,
          contact: winner.contact ?? loser.contact,
          verification: winner.verification ?? loser.verification,
        }),
      );
    }

    return [...merged.values()].sort((a, b) => this.compare(a, b));
  }

  select(candidates: EmailCandidate[], maxBackups = 3): CandidateSelection {
    const ranked = this.score(candidates);
    const best = ranked[0] ?? null;
    if (!best) return { best: null, backups: [] };

    const backups = ranked
      .slice(1)
      .filter((c) => c.score >= best.score * BACKUP_RATIO)
      .slice(0, maxBackups);
    return { best, backups };
  }

  private scoreOne(candidate: EmailCandidate): ScoredCandidate {
    const { observed, conventionality, role, functionalPenalty, context, url } = this.weights;
    const localPart = candidate.address.slice(0, candidate.address.indexOf('@'));

    const isObserved = candidate.origin === 'observed';
    const conventional =
      !isObserved && candidate.patternIndex !== undefined
        ? 1 - candidate.patternIndex / EMAIL_PATTERNS.length
        : candidate.personal
          ? 1
          : candidate.functional
            ? 0
            : 0.5;
    const relevance = Math.max(
      this.roleRelevance(candidate.contact?.title),
      isObserved ? this.roleRelevance(localPart) : 0,
    );

    const raw =
      (isObserved ? observed : 0) +
      conventionality * conventional +
      role * relevance -
      (candidate.functional ? functionalPenalty : 0) +
      (isObserved ? context * contextSignal(candidate.context) : 0) +
      (isObserved && isCareersUrl(candidate.sourceUrl) ? url : 0);

    // Context and URL only lift an address toward full confidence.
    const ceiling = observed + conventionality + role;
    const confidence =
      candidate.verification === 'valid'
        ? 1
        : ceiling > 0
          ? Math.min(1, Math.max(0, raw / ceiling))
          : 0;

    return { ...candidate, score: round(raw), confidence: round(confidence) };
  }

  private compare(a: ScoredCandidate, b: ScoredCandidate): number {
    return (
      tier(b.verification) - tier(a.verification) ||
      b.score - a.score ||
      (a.address < b.address ? -1 : a.address > b.address ? 1 : 0)
    );
  }
}
