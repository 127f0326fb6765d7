import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsString, ValidateNested } from 'class-validator';

export class GitHubRefDto {
  @IsOptional()
  @IsString()
  ref?: string;
}

export class GitHubPullRequestDto {
  @IsOptional()
  @IsString()
  html_url?: string;

  @IsOptional()
  @IsInt()
  number?: number;

  @IsOptional()
  @IsString()
  title?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => GitHubRefDto)
  head?: GitHubRefDto;
}

export class GitHubPullRequestWebhookDto {
  @IsOptional()
  @IsString()
  action?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => GitHubPullRequestDto)
  pull_request?: GitHubPullRequestDto;
}
