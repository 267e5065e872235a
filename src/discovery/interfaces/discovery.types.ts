export interface Organization {
  name: string;
  domain?: string | null;
}

export type ContactSource = 'search_result' | 'crawled_page';

export interface Contact {
  fullName: string;
  firstName: string;
  lastName: string;
  title?: string;
  organizationKey: string;
  source: ContactSource;
  sourceUrl?: string;
}

export type SignalConfidence = 'high' | 'medium' | 'low';

export interface NamedContactSignal {
  kind: 'named_contact';
  contact: Contact;
  confidence: SignalConfidence;
}

export interface RawEmailSignal {
  kind: 'raw_email';
  address: string;
  context: string;
  sourceUrl?: string;
  /** Local part shaped like a person's name (first.last, j.smith). */
  personal: boolean;
  /** Generic mailbox such as info@ or support@. */
  functional: boolean;
  confidence: SignalConfidence;
}

export type ExtractedSignal = NamedContactSignal | RawEmailSignal;

export interface ExtractionResult {
  contacts: Contact[];
  emails: RawEmailSignal[];
}

export type VerificationStatus = 'valid' | 'invalid' | 'unknown';

export type CandidateOrigin = 'observed' | 'generated';

export interface EmailCandidate {
  address: string;
  origin: CandidateOrigin;
  /** Pattern name for generated addresses, `observed` otherwise. */
  pattern: string;
  patternIndex?: number;
  contact?: Contact;
  personal: boolean;
  functional: boolean;
  context?: string;
  sourceUrl?: string;
  verification?: VerificationStatus;
}

export interface ScoredCandidate extends EmailCandidate {
  score: number;
  /** Score normalised to 0..1. */
  confidence: number;
}

export interface CandidateSelection {
  best: ScoredCandidate | null;
  backups: ScoredCandidate[];
}
