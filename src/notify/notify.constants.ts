/**
 * Injection token for the desktop notifier
 */
export const HOST_NOTIFIER = Symbol('HOST_NOTIFIER');

export const NOTIFY_EVENTS = {
  PRAYER_DUE: 'prayer.due',
} as const;

/** SchedulerRegistry name of the pending daemon timeout */
export const NOTIFY_TIMEOUT_NAME = 'miqat-notify';

export const NOTIFICATION_TITLE = 'miqat';

/** Wait after a failed fetch before trying again */
export const RETRY_DELAY_MS = 60_000;

/** Pause after a notification so the next lookup lands past the prayer minute */
export const RESCHEDULE_PAUSE_MS = 2_000;

/** Shortest wait the daemon schedules */
export const MIN_DELAY_MS = 1_000;
