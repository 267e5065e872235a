import { IsNotEmpty, IsOptional, IsString, Matches, MaxLength, validateSync } from 'class-validator';
import { InvalidInputError } from '../../common/errors';

export interface OrganizationInput {
  name?: string | null;
  domain?: string | null;
}

export class OrganizationRecordDto {
  @IsString()
  @IsNotEmpty()
  @Matches(/\S/, { message: 'name must contain a non-space character' })
  @MaxLength(200)
  name!: string;

  @IsString()
  @IsOptional()
  @MaxLength(253)
  domain?: string;
}

/**
 * Validates one input row. Blank domains count as absent.
 */
export function validateOrganizationRecord(input: OrganizationInput): OrganizationRecordDto {
  const record = new OrganizationRecordDto();
  record.name = input.name?.trim() ?? '';
  const domain = input.domain?.trim();
  if (domain) record.domain = domain;

  const errors = validateSync(record);
  if (errors.length > 0) {
    const problems = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new InvalidInputError(`Malformed organization record: ${problems.join(', ')}`);
  }
  return record;
}
