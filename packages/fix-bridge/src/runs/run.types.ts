export enum RunStatus {
  CREATED = 'CREATED',
  RUNNING = 'RUNNING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  CANCELLED = 'CANCELLED',
}

export const TERMINAL_STATUSES: ReadonlySet<RunStatus> = new Set([
  RunStatus.COMPLETED,
  RunStatus.FAILED,
  RunStatus.CANCELLED,
]);

// Position along CREATED -> RUNNING -> terminal; transitions must increase it
const STATUS_RANK: Record<RunStatus, number> = {
  [RunStatus.CREATED]: 0,
  [RunStatus.RUNNING]: 1,
  [RunStatus.COMPLETED]: 2,
  [RunStatus.FAILED]: 2,
  [RunStatus.CANCELLED]: 2,
};

export function isTerminal(status: RunStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function isForwardTransition(from: RunStatus, to: RunStatus): boolean {
  if (isTerminal(from) || STATUS_RANK[to] <= STATUS_RANK[from]) {
    return false;
  }
  // Only a started run can complete; a run that never started can only fail or be cancelled
  return !(from === RunStatus.CREATED && to === RunStatus.COMPLETED);
}

export interface RunResult {
  prUrl?: string;
  prNumber?: number;
  branchName?: string;
  commitSha?: string;
  filesChanged?: string[];
  analysis?: string;
}

export interface RunError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface Run {
  runId: string;
  correlationKey: string;
  status: RunStatus;
  createdAt: Date;
  updatedAt: Date;
  result?: RunResult;
  // Set only on FAILED runs
  error?: RunError;
  // Set only on CANCELLED runs
  cancelReason?: string;
  attemptCount: number;
  usedFallback: boolean;
  // Remote path that accepted the task
  executor?: string;
  externalRef?: string;
}

export interface RunOutcome {
  result?: RunResult;
  error?: RunError;
  cancelReason?: string;
}

export interface DispatchMetadata {
  attemptCount: number;
  usedFallback: boolean;
  executor: string;
  externalRef?: string;
}

export interface TransitionResult {
  run: Run;
  // false when the requested terminal status was already recorded
  changed: boolean;
}
