/**
 * Run storage
 *
 * RunStore is the persistence seam for the registry. Any durable
 * implementation must make replace() a conditional update keyed on the
 * status the caller last read, so the forward-only rule holds even across
 * processes.
 */

import { Injectable } from '@nestjs/common';
import { Run, RunStatus } from './run.types';
import { DuplicateRunError } from './runs.errors';

export abstract class RunStore {
  /** Insert a new run; fails with DuplicateRunError if the id is taken */
  abstract insert(run: Run): Promise<void>;

  abstract findById(runId: string): Promise<Run | undefined>;

  abstract findByExternalRef(externalRef: string): Promise<Run | undefined>;

  /** Runs for a correlation key, oldest first */
  abstract findByCorrelationKey(correlationKey: string): Promise<Run[]>;

  /**
   * Replace a run only if its stored status still equals expectedStatus.
   * Returns false when the stored run moved on (or vanished).
   */
  abstract replace(run: Run, expectedStatus: RunStatus): Promise<boolean>;
}

@Injectable()
export class InMemoryRunStore extends RunStore {
  private readonly runs = new Map<string, Run>();
  private readonly externalRefs = new Map<string, string>();

  async insert(run: Run): Promise<void> {
    if (this.runs.has(run.runId)) {
      throw new DuplicateRunError(run.runId);
    }
    this.runs.set(run.runId, structuredClone(run));
    this.indexExternalRef(run);
  }

  async findById(runId: string): Promise<Run | undefined> {
    const run = this.runs.get(runId);
    return run ? structuredClone(run) : undefined;
  }

  async findByExternalRef(externalRef: string): Promise<Run | undefined> {
    const runId = this.externalRefs.get(externalRef);
    return runId ? this.findById(runId) : undefined;
  }

  async findByCorrelationKey(correlationKey: string): Promise<Run[]> {
    return [...this.runs.values()]
      .filter((run) => run.correlationKey === correlationKey)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((run) => structuredClone(run));
  }

  async replace(run: Run, expectedStatus: RunStatus): Promise<boolean> {
    const current = this.runs.get(run.runId);
    if (!current || current.status !== expectedStatus) {
      return false;
    }
    this.runs.set(run.runId, structuredClone(run));
    this.indexExternalRef(run);
    return true;
  }

  private indexExternalRef(run: Run): void {
    if (run.externalRef) {
      this.externalRefs.set(run.externalRef, run.runId);
    }
  }
}
