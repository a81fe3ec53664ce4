import { errorMessage } from '../errors';
import { ManagerRecord } from '../types';
import { Messenger, dispatchActions } from './messaging';
import { formatReminder, summarizeSession } from './presentation';
import { deriveState } from './sessionMachine';
import { SessionStore } from './sessionStore';

export interface ReminderPolicy {
  idleMinutes: number;
  maxReminders: number;
}

const MINUTE_MS = 60_000;

/**
 * A manager is nudged when a review is waiting on them, they have been
 * quiet for idleMinutes, and they have not had maxReminders already.
 * Reminders are spaced by the same idle window.
 */
export const shouldRemind = (record: ManagerRecord, now: Date, policy: ReminderPolicy): boolean => {
  const state = deriveState(record.session);
  if (state !== 'AWAITING_DECISION' && state !== 'AWAITING_FEEDBACK') return false;
  if (record.mode !== 'review' || record.ingestionInFlight) return false;
  if (!record.lastActivity || record.remindersSent >= policy.maxReminders) return false;

  const idleMs = policy.idleMinutes * MINUTE_MS;
  if (now.getTime() - record.lastActivity.getTime() < idleMs) return false;
  if (record.lastReminderAt && now.getTime() - record.lastReminderAt.getTime() < idleMs) return false;
  return true;
};

/** Sends due reminders. Returns the managers that were reminded. */
export const sendIdleReminders = async (
  store: SessionStore,
  messenger: Messenger,
  policy: ReminderPolicy,
  now: Date = new Date()
): Promise<string[]> => {
  const reminded: string[] = [];

  for (const managerId of await store.listManagers()) {
    try {
      const text = await store.withLock(managerId, async () => {
        const record = await store.getRecord(managerId);
        if (!shouldRemind(record, now, policy)) return null;
        await store.updateRecord(managerId, { remindersSent: record.remindersSent + 1, lastReminderAt: now });
        return formatReminder(summarizeSession(record.session));
      });
      if (!text) continue;

      await dispatchActions(messenger, [{ kind: 'text', recipientId: managerId, text }]);
      reminded.push(managerId);
    } catch (error: unknown) {
      console.error(`[scheduler] Reminder for ${managerId} failed:`, errorMessage(error));
    }
  }
  return reminded;
};
