import { IsIn, IsNotEmpty, IsOptional, IsString, IsUrl, MaxLength } from 'class-validator';

export const COMMIT_STATUS_STATES = ['pending', 'success', 'error', 'failure'] as const;

export type CommitStatusState = (typeof COMMIT_STATUS_STATES)[number];

/**
 * DTO for creating a commit status
 */
export class CreateCommitStatusDto {
  @IsIn(COMMIT_STATUS_STATES)
  state!: CommitStatusState;

  /** GitHub rejects longer descriptions */
  @IsString()
  @MaxLength(140)
  description!: string;

  @IsString()
  @IsNotEmpty()
  context!: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  target_url?: string;
}
