import type { Contact, Organization } from '../../discovery/interfaces/discovery.types';

export type OutreachStatus =
  | 'found'
  | 'no_contact_found'
  | 'no_domain_resolved'
  | 'skipped_duplicate'
  | 'error';

export interface OutreachResult {
  organization: Organization;
  organizationKey: string;
  domain: string | null;
  status: OutreachStatus;
  bestContact: Contact | null;
  bestEmail: string | null;
  score: number;
  confidence: number;
  backups: string[];
  reason?: string;
  /** Rebuilt from a previous run instead of searched again. */
  fromCache: boolean;
}
