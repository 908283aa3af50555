import { PrayerSource } from '../common/types/prayer';
import { Location } from '../location/location.schema';

export const TURKEY_COUNTRY_CODE = 'TR';

const TURKEY_NAMES = new Set(['türkiye', 'turkiye']);

export function isTurkiyeLocation(location: Location): boolean {
  if (location.countryCode.toUpperCase() === TURKEY_COUNTRY_CODE) {
    return true;
  }
  return TURKEY_NAMES.has(location.country.trim().toLowerCase());
}

/**
 * Diyanet only publishes times for Turkey; everywhere else uses the MWL method.
 */
export function resolvePrayerSource(location: Location, preferred: PrayerSource): PrayerSource {
  return isTurkiyeLocation(location) ? preferred : 'mwl';
}
