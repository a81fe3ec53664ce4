import cron, { ScheduledTask } from 'node-cron';
import { AppConfig } from '../config';
import { errorMessage } from '../errors';
import { Messenger } from '../services/messaging';
import { sendIdleReminders } from '../services/reminderPolicy';
import { SessionStore } from '../services/sessionStore';

let tasks: ScheduledTask[] = [];

const stopAll = () => {
  for (const t of tasks) {
    try {
      t.stop();
    } catch (error: unknown) {
      console.warn('[scheduler] Failed to stop task:', errorMessage(error));
    }
  }
  tasks = [];
};

export interface SchedulerDeps {
  store: SessionStore;
  messenger: Messenger;
  reminders: AppConfig['reminders'];
}

export const startScheduler = (deps: SchedulerDeps): ScheduledTask[] => {
  stopAll();
  const { reminders } = deps;

  if (reminders.disabled) {
    console.log('[scheduler] Disabled (DISABLE_SCHEDULER=true)');
    return tasks;
  }
  if (!cron.validate(reminders.cron)) {
    console.error(`[scheduler] Invalid REMINDER_CRON "${reminders.cron}"; reminders not scheduled`);
    return tasks;
  }

  console.log(`[scheduler] Idle reminders on "${reminders.cron}" (TZ=${reminders.timezone})`);
  tasks.push(
    cron.schedule(
      reminders.cron,
      async () => {
        try {
          const reminded = await sendIdleReminders(deps.store, deps.messenger, {
            idleMinutes: reminders.idleMinutes,
            maxReminders: reminders.maxReminders,
          });
          if (reminded.length > 0) console.log(`[scheduler] ✓ Sent ${reminded.length} reminder(s)`);
        } catch (error: unknown) {
          console.error('[scheduler] Reminder sweep failed:', errorMessage(error));
        }
      },
      { timezone: reminders.timezone }
    )
  );
  return tasks;
};

export const stopScheduler = () => stopAll();
