import { z } from 'zod';

import { PRAYER_SOURCES, TIME_FORMATS } from '../common/types/prayer';
import { locationSchema } from '../location/location.schema';

/**
 * Schema for the user settings file (~/.config/miqat/config.json).
 */
export const settingsSchema = z.object({
  location: locationSchema,

  /** Preferred source; only honoured where it applies (see resolvePrayerSource) */
  prayerSource: z.enum(PRAYER_SOURCES).default('diyanet'),

  timeFormat: z.enum(TIME_FORMATS).default('24h'),
});

export type Settings = z.infer<typeof settingsSchema>;
