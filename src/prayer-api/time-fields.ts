import { PrayerApiError } from '../common/errors';
import { PrayerTimeService } from '../prayer-time/prayer-time.service';

/**
 * Read one time-of-day field from an API payload as "HH:mm".
 * A missing or unparseable field makes the whole response unusable.
 */
export function requireTimeField(
  prayerTime: PrayerTimeService,
  payload: Record<string, unknown>,
  key: string,
): string {
  const raw = payload[key];
  if (typeof raw !== 'string') {
    throw new PrayerApiError(`Missing time field: ${key}`);
  }

  const hhmm = prayerTime.toHHmm(raw);
  if (!hhmm) {
    throw new PrayerApiError(`Invalid time format for ${key}: "${raw}"`);
  }
  return hhmm;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
