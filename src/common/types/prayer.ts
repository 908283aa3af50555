/**
 * Daily prayer names in chronological order.
 * Sunrise is not a prayer but is shown and counted down like one.
 */
export const PRAYER_NAMES = ['Fajr', 'Sunrise', 'Dhuhr', 'Asr', 'Maghrib', 'Isha'] as const;

export type PrayerName = (typeof PRAYER_NAMES)[number];

/**
 * Prayer time sources.
 * - diyanet: Turkish Presidency of Religious Affairs (district keyed)
 * - mwl: Muslim World League method via the AlAdhan API
 */
export const PRAYER_SOURCES = ['diyanet', 'mwl'] as const;

export type PrayerSource = (typeof PRAYER_SOURCES)[number];

export const TIME_FORMATS = ['12h', '24h'] as const;

export type TimeFormat = (typeof TIME_FORMATS)[number];

/**
 * Times of day for a single date, each as "HH:mm".
 */
export type PrayerTimes = Record<PrayerName, string>;

export const SOURCE_LABELS: Record<PrayerSource, string> = {
  diyanet: 'Diyanet',
  mwl: 'Muslim World League (AlAdhan)',
};

export function isPrayerSource(value: string): value is PrayerSource {
  return (PRAYER_SOURCES as readonly string[]).includes(value);
}

export function isTimeFormat(value: string): value is TimeFormat {
  return (TIME_FORMATS as readonly string[]).includes(value);
}

/** Diyanet publishes times for Turkey, always in Turkish time. */
export const DIYANET_TIME_ZONE = 'Europe/Istanbul';
