import {
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
} from 'class-validator';

export const REPORTED_STATUSES = [
  'pending',
  'running',
  'completed',
  'failed',
  'cancelled',
  'timeout',
] as const;

export type ReportedStatus = (typeof REPORTED_STATUSES)[number];

export class AgentCallbackDto {
  // Our run id, or the agent's own run id
  @IsNotEmpty()
  @IsString()
  run_id!: string;

  @IsIn(REPORTED_STATUSES)
  status!: ReportedStatus;

  @IsOptional()
  @IsString()
  pr_url?: string;

  @IsOptional()
  @IsInt()
  pr_number?: number;

  @IsOptional()
  @IsString()
  branch_name?: string;

  @IsOptional()
  @IsString()
  commit_sha?: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  files_changed?: string[];

  @IsOptional()
  @IsString()
  agent_analysis?: string;

  @IsOptional()
  @IsString()
  error_message?: string;

  @IsOptional()
  @IsNumber()
  completed_at?: number;
}
