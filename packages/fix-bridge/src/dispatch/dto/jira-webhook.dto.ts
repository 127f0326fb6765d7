import { Type } from 'class-transformer';
import { IsArray, IsOptional, IsString, ValidateNested } from 'class-validator';

export class JiraIssueFieldsDto {
  @IsOptional()
  @IsString()
  summary?: string;

  // Plain text on API v2, an ADF document on v3
  @IsOptional()
  description?: unknown;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  labels?: string[];
}

export class JiraIssueDto {
  @IsOptional()
  @IsString()
  key?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => JiraIssueFieldsDto)
  fields?: JiraIssueFieldsDto;
}

export class JiraWebhookDto {
  @IsOptional()
  @IsString()
  webhookEvent?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => JiraIssueDto)
  issue?: JiraIssueDto;
}
