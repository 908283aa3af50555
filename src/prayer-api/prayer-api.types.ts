import { PrayerSource, PrayerTimes } from '../common/types/prayer';

/**
 * Times for today plus what is needed to count down past Isha.
 */
export interface FetchedPrayerTimes {
  times: PrayerTimes;
  tomorrowFajr: string;
  /** IANA zone of the times, when known */
  timeZone: string | null;
}

/**
 * Result of a fetch, live or served from the cache.
 */
export interface PrayerBundle extends FetchedPrayerTimes {
  requestedSource: PrayerSource;
  resolvedSource: PrayerSource;
  fromCache: boolean;
}
