import { errorMessage } from '../errors';
import { SessionStore } from './sessionStore';

export type EnqueueResult = 'queued' | 'in_flight';

interface Job {
  managerId: string;
  run: () => Promise<void>;
}

/**
 * Runs fetch/analyze jobs off the request path, at most `concurrency`
 * at a time and one per manager. The manager record's ingestionInFlight
 * flag mirrors the queue.
 */
export class IngestionQueue {
  private waiting: Job[] = [];
  private running = 0;
  private inFlight = new Set<string>();
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly store: SessionStore,
    private readonly concurrency = 1
  ) {}

  isInFlight(managerId: string): boolean {
    return this.inFlight.has(managerId);
  }

  get size(): number {
    return this.waiting.length + this.running;
  }

  /** Must not be called while holding the manager's lock. */
  async enqueue(managerId: string, run: () => Promise<void>): Promise<EnqueueResult> {
    if (this.inFlight.has(managerId)) return 'in_flight';
    this.inFlight.add(managerId);

    await this.setFlag(managerId, true);
    this.waiting.push({ managerId, run });
    console.log(`[ingestion] Queued fetch for ${managerId} (${this.waiting.length} waiting, ${this.running} running)`);
    this.pump();
    return 'queued';
  }

  /** Resolves once nothing is waiting or running. */
  onIdle(): Promise<void> {
    if (this.size === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private pump() {
    while (this.running < Math.max(1, this.concurrency)) {
      const job = this.waiting.shift();
      if (!job) break;
      this.running += 1;
      void this.execute(job);
    }
    if (this.size === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }

  private async execute(job: Job): Promise<void> {
    try {
      await job.run();
    } catch (error: unknown) {
      console.error(`[ingestion] ❌ Job for ${job.managerId} failed:`, errorMessage(error));
    } finally {
      this.inFlight.delete(job.managerId);
      await this.setFlag(job.managerId, false);
      this.running -= 1;
      this.pump();
    }
  }

  private async setFlag(managerId: string, value: boolean): Promise<void> {
    try {
      await this.store.withLock(managerId, () => this.store.updateRecord(managerId, { ingestionInFlight: value }));
    } catch (error: unknown) {
      console.error(`[ingestion] Could not update in-flight flag for ${managerId}:`, errorMessage(error));
    }
  }
}
