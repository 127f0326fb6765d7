import { Logger } from '@nestjs/common';
import { createId } from '@paralleldrive/cuid2';
import {
  FixTaskRequest,
  RemoteTaskClient,
  RemoteTaskHandle,
  RemoteTaskStatus,
} from './remote-task-client';

/**
 * In-process stand-in for the coding-agent service, used for local runs
 * and whenever no agent API is configured. Tasks stay "running" until the
 * completion callback arrives from outside.
 */
export class SimulatedAgentClient implements RemoteTaskClient {
  readonly name = 'simulated-agent';
  private readonly logger = new Logger(SimulatedAgentClient.name);
  private readonly tasks = new Map<string, string>();

  async createTask(request: FixTaskRequest): Promise<RemoteTaskHandle> {
    const externalRef = `sim_${createId()}`;
    this.tasks.set(externalRef, 'running');
    this.logger.log(`[SIMULATED] Created agent run ${externalRef} for ${request.correlationKey}`);
    return { externalRef, remoteStatus: 'running' };
  }

  async getTaskStatus(externalRef: string): Promise<RemoteTaskStatus | null> {
    const status = this.tasks.get(externalRef);
    if (!status) {
      return null;
    }
    return {
      externalRef,
      status,
      progress: status === 'running' ? 0.5 : 1,
      currentStep: status === 'running' ? 'Analyzing codebase' : undefined,
    };
  }

  async cancelTask(externalRef: string): Promise<boolean> {
    if (this.tasks.get(externalRef) !== 'running') {
      return false;
    }
    this.tasks.set(externalRef, 'cancelled');
    this.logger.log(`[SIMULATED] Cancelled agent run ${externalRef}`);
    return true;
  }
}
