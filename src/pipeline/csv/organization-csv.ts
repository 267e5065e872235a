import { readFile, writeFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { InvalidInputError } from '../../common/errors';
import type { OrganizationInput } from '../dto/organization-record.dto';
import type { OutreachResult } from '../interfaces/outreach-result.interface';

const NAME_HEADERS = ['name', 'company_name', 'organization'];
const DOMAIN_HEADERS = ['domain', 'company_domain', 'website'];

export const OUTPUT_COLUMNS = [
  'organization',
  'domain',
  'contact_name',
  'contact_title',
  'email',
  'score',
  'confidence',
  'status',
  'backup_emails',
  'reason',
] as const;

const RowsSchema = z.array(z.record(z.string()));

function pick(row: Record<string, string>, headers: string[]): string | null {
  for (const header of headers) {
    const value = row[header];
    if (value !== undefined && value !== '') return value;
  }
  return null;
}

/**
 * Parses organization rows. Headers are matched case-insensitively; a file
 * without any recognised name column is rejected as a whole.
 */
export function parseOrganizationsCsv(content: string): OrganizationInput[] {
  const parsed: unknown = parse(content, {
    columns: (header: string[]) => header.map((column) => column.trim().toLowerCase()),
    skip_empty_lines: true,
    trim: true,
    bom: true,
    relax_column_count: true,
  });
  const rows = RowsSchema.parse(parsed);
  if (rows.length === 0) return [];

  const columns = Object.keys(rows[0]);
  if (!NAME_HEADERS.some((header) => columns.includes(header))) {
    throw new InvalidInputError(
      `Input CSV needs one of the columns: ${NAME_HEADERS.join(', ')}`,
      'name',
    );
  }

  return rows.map((row) => ({
    name: pick(row, NAME_HEADERS),
    domain: pick(row, DOMAIN_HEADERS),
  }));
}

export function formatResultsCsv(results: OutreachResult[]): string {
  return stringify(
    results.map((result) => ({
      organization: result.organization.name,
      domain: result.domain ?? '',
      contact_name: result.bestContact?.fullName ?? '',
      contact_title: result.bestContact?.title ?? '',
      email: result.bestEmail ?? '',
      score: result.score,
      confidence: result.confidence,
      status: result.status,
      backup_emails: result.backups.join(';'),
      reason: result.reason ?? '',
    })),
    { header: true, columns: [...OUTPUT_COLUMNS] },
  );
}

export async function readOrganizationsCsv(path: string): Promise<OrganizationInput[]> {
  return parseOrganizationsCsv(await readFile(path, 'utf8'));
}

export async function writeResultsCsv(path: string, results: OutreachResult[]): Promise<void> {
  await writeFile(path, formatResultsCsv(results), 'utf8');
}
