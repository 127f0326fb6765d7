/**
 * Remote task execution capability.
 *
 * Every path that can start a fix task (coding-agent API, simulated agent,
 * repository dispatch) implements this interface; the dispatcher never
 * knows which one it is talking to.
 */

export const PRIMARY_TASK_CLIENT = 'PRIMARY_TASK_CLIENT';
export const FALLBACK_TASK_CLIENT = 'FALLBACK_TASK_CLIENT';

export interface FixTaskRequest {
  runId: string;
  correlationKey: string;
  summary: string;
  description: string;
  ticketUrl?: string;
  repository?: string;
  baseBranch: string;
}

export interface RemoteTaskHandle {
  // Remote identifier, when the remote hands one back
  externalRef?: string;
  remoteStatus?: string;
}

export interface RemoteTaskStatus {
  externalRef: string;
  status: string;
  progress?: number;
  currentStep?: string;
  errorMessage?: string;
}

export interface RemoteTaskClient {
  readonly name: string;

  createTask(request: FixTaskRequest, signal?: AbortSignal): Promise<RemoteTaskHandle>;

  /** null when the remote cannot report task status */
  getTaskStatus(externalRef: string, signal?: AbortSignal): Promise<RemoteTaskStatus | null>;

  /** false when the remote refused or cannot cancel */
  cancelTask(externalRef: string, signal?: AbortSignal): Promise<boolean>;
}

export function branchNameFor(correlationKey: string): string {
  return `fix/${correlationKey}`;
}
