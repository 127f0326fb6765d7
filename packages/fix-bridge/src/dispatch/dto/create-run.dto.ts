import { IsNotEmpty, IsOptional, IsString, IsUrl, Matches, MaxLength } from 'class-validator';

export class CreateRunDto {
  @IsNotEmpty()
  @IsString()
  @MaxLength(255)
  correlationKey!: string;

  @IsNotEmpty()
  @IsString()
  summary!: string;

  @IsString()
  description!: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  ticketUrl?: string;

  // owner/repo
  @IsOptional()
  @Matches(/^[\w.-]+\/[\w.-]+$/)
  repository?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  baseBranch?: string;
}
