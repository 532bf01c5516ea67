import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Min,
  ValidateBy,
  ValidateNested,
  ValidationOptions,
} from 'class-validator';

/** GitHub sends numeric ids; string ids are accepted for replayed payloads. */
function IsIssueId(options?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isIssueId',
      validator: {
        validate: (value: unknown) =>
          (typeof value === 'number' && Number.isFinite(value)) ||
          (typeof value === 'string' && value.trim().length > 0),
        defaultMessage: () => '$property must be a number or a non-empty string',
      },
    },
    options,
  );
}

export class IssueUserDto {
  @IsOptional()
  @IsString()
  login?: string | null;
}

export class IssueRepositoryDto {
  @IsString()
  @IsNotEmpty()
  full_name!: string;
}

export class IssuePayloadDto {
  @IsIssueId()
  id!: number | string;

  @IsInt()
  @Min(1)
  number!: number;

  @IsIn(['open', 'closed'])
  state!: 'open' | 'closed';

  @IsOptional()
  @IsString()
  state_reason?: string | null;

  @IsOptional()
  @IsString()
  title?: string | null;

  @IsOptional()
  @IsString()
  body?: string | null;

  @IsOptional()
  @IsBoolean()
  locked?: boolean | null;

  @IsOptional()
  @IsString()
  html_url?: string | null;

  @IsOptional()
  @IsString()
  repository_url?: string | null;

  @IsOptional()
  @ValidateNested()
  @Type(() => IssueUserDto)
  user?: IssueUserDto | null;

  // labels / assignees are decoded separately and never fail validation
  labels?: unknown;
  assignees?: unknown;

  @IsOptional()
  @IsString()
  created_at?: string | null;

  @IsOptional()
  @IsString()
  updated_at?: string | null;

  @IsOptional()
  @IsString()
  closed_at?: string | null;
}

export class IssueEventDto {
  @IsOptional()
  @IsString()
  action?: string;

  @IsObject()
  @ValidateNested()
  @Type(() => IssuePayloadDto)
  issue!: IssuePayloadDto;

  @IsOptional()
  @ValidateNested()
  @Type(() => IssueRepositoryDto)
  repository?: IssueRepositoryDto | null;
}
