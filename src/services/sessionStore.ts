import { ManagerRecord, Session } from '../types';
import { KeyedLock } from '../utils/asyncLock';

export type ManagerRecordPatch = Partial<Omit<ManagerRecord, 'managerId'>>;

/**
 * Keyed store for per-manager workflow state.
 *
 * get/put/clear/updateRecord do not lock on their own: wrap every
 * read-modify-write of one manager in withLock(managerId, ...).
 */
export interface SessionStore {
  get(managerId: string): Promise<Session | undefined>;
  put(managerId: string, session: Session): Promise<void>;
  /** Drops the review session only; activity, mode and memory survive. */
  clear(managerId: string): Promise<void>;
  getRecord(managerId: string): Promise<ManagerRecord>;
  updateRecord(managerId: string, patch: ManagerRecordPatch): Promise<ManagerRecord>;
  touch(managerId: string, at: Date): Promise<void>;
  listManagers(): Promise<string[]>;
  withLock<T>(managerId: string, fn: () => Promise<T> | T): Promise<T>;
}

const emptyRecord = (managerId: string): ManagerRecord => ({
  managerId,
  remindersSent: 0,
  mode: 'review',
  memory: [],
  ingestionInFlight: false,
});

export class InMemorySessionStore implements SessionStore {
  private records = new Map<string, ManagerRecord>();
  private locks = new KeyedLock();

  async get(managerId: string): Promise<Session | undefined> {
    const session = this.records.get(managerId)?.session;
    return session ? structuredClone(session) : undefined;
  }

  async put(managerId: string, session: Session): Promise<void> {
    const record = this.records.get(managerId) ?? emptyRecord(managerId);
    this.records.set(managerId, { ...record, session: structuredClone(session) });
  }

  async clear(managerId: string): Promise<void> {
    const record = this.records.get(managerId);
    if (!record) return;
    this.records.set(managerId, {
      ...record,
      session: undefined,
      lastReminderAt: undefined,
      remindersSent: 0,
    });
  }

  async getRecord(managerId: string): Promise<ManagerRecord> {
    return structuredClone(this.records.get(managerId) ?? emptyRecord(managerId));
  }

  async updateRecord(managerId: string, patch: ManagerRecordPatch): Promise<ManagerRecord> {
    const current = this.records.get(managerId) ?? emptyRecord(managerId);
    const next: ManagerRecord = { ...current, ...structuredClone(patch), managerId };
    this.records.set(managerId, next);
    return structuredClone(next);
  }

  async touch(managerId: string, at: Date): Promise<void> {
    await this.updateRecord(managerId, { lastActivity: at });
  }

  async listManagers(): Promise<string[]> {
    return Array.from(this.records.keys());
  }

  async withLock<T>(managerId: string, fn: () => Promise<T> | T): Promise<T> {
    return this.locks.run(managerId, fn);
  }

  /** Number of managers with a held or queued lock. */
  activeLockCount(): number {
    return this.locks.size;
  }
}
