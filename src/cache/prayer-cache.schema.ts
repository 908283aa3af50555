import { z } from 'zod';

const hhmm = z.string().regex(/^\d{2}:\d{2}$/);

export const prayerTimesSchema = z.object({
  Fajr: hhmm,
  Sunrise: hhmm,
  Dhuhr: hhmm,
  Asr: hhmm,
  Maghrib: hhmm,
  Isha: hhmm,
});

/**
 * Schema for one cached fetch result.
 */
export const cacheEntrySchema = z.object({
  times: prayerTimesSchema,

  tomorrowFajr: hhmm,

  /** IANA zone the times are expressed in, if the API reported one */
  timeZone: z.string().nullable(),

  /** Calendar date (YYYY-MM-DD) of `times` in `timeZone` */
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),

  /** When the entry was written (ISO string) */
  fetchedAt: z.string(),
});

export type CacheEntry = z.infer<typeof cacheEntrySchema>;

/**
 * The cache file maps location/source keys to entries.
 * Entries are validated one by one so a single bad entry is simply skipped.
 */
export const cacheFileSchema = z.record(z.string(), z.unknown());
