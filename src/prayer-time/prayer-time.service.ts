import { Injectable } from '@nestjs/common';
import { addDays, format, isValid, set } from 'date-fns';
import { fromZonedTime, toZonedTime } from 'date-fns-tz';

import { PRAYER_NAMES, PrayerName, PrayerTimes, TimeFormat } from '../common/types/prayer';

/**
 * Where "now" falls among the day's prayers.
 */
export interface CurrentPrayerInfo {
  /** Last prayer whose time has passed; Isha before dawn */
  currentPrayer: PrayerName;
  nextPrayer: PrayerName;
  /** "HH:mm" of the next prayer */
  nextPrayerTime: string;
  msUntilNext: number;
  /** True once Isha has passed and the next prayer is tomorrow's Fajr */
  isAfterIsha: boolean;
}

interface PrayerTimePoint {
  name: PrayerName;
  time: string;
  at: Date;
}

const HHMM_PATTERN = /(\d{1,2}):(\d{2})/;

/**
 * Service for reasoning about a day's prayer times: which prayer is next,
 * how long until it, and how to display a time of day.
 *
 * All comparisons happen on wall-clock time in the prayer times' own zone,
 * so a Diyanet schedule reads correctly on a machine set to another zone.
 */
@Injectable()
export class PrayerTimeService {
  /**
   * Normalise an API time value to "HH:mm".
   * Accepts values like "5:07", "05:07 (+03)" or "05:07:00".
   * Returns null when no valid time of day is present.
   */
  toHHmm(value: string): string | null {
    const match = HHMM_PATTERN.exec(value);
    if (!match) return null;

    const hours = parseInt(match[1], 10);
    const minutes = parseInt(match[2], 10);
    if (hours > 23 || minutes > 59) return null;

    return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
  }

  /**
   * Current wall-clock time in a zone, as a Date whose local fields carry it.
   * Falls back to the host zone when no zone (or an unknown one) is given.
   */
  getZonedNow(timeZone: string | null, now: Date = new Date()): Date {
    const zone = this.knownZone(timeZone);
    return zone ? toZonedTime(now, zone) : now;
  }

  /**
   * Calendar date ("yyyy-MM-dd") of `now` in a zone, host zone as fallback.
   */
  getZonedDate(timeZone: string | null, now: Date = new Date()): string {
    return format(this.getZonedNow(timeZone, now), 'yyyy-MM-dd');
  }

  /**
   * Place an "HH:mm" time on the calendar day of `base`.
   */
  timeOnDate(time: string, base: Date): Date {
    const [hours, minutes] = time.split(':').map((part) => parseInt(part, 10));
    return set(base, { hours, minutes, seconds: 0, milliseconds: 0 });
  }

  /**
   * Work out the current and next prayer.
   *
   * After Isha the next prayer is tomorrow's Fajr (falling back to today's Fajr time
   * when tomorrow's is unknown). Before Fajr the current prayer is the previous
   * night's Isha and the next is today's Fajr.
   */
  getCurrentPrayerInfo(
    times: PrayerTimes,
    tomorrowFajr: string | null,
    timeZone: string | null,
    now: Date = new Date(),
  ): CurrentPrayerInfo {
    const zone = this.knownZone(timeZone);
    const zonedNow = this.getZonedNow(zone, now);
    // Wall-clock dates are shifted back to real instants so DST changes in either zone count
    const instant = (wallClock: Date) => (zone ? fromZonedTime(wallClock, zone) : wallClock).getTime();
    const nowMs = now.getTime();

    const points: PrayerTimePoint[] = PRAYER_NAMES.map((name) => ({
      name,
      time: times[name],
      at: this.timeOnDate(times[name], zonedNow),
    }));

    for (let i = points.length - 1; i >= 0; i--) {
      if (nowMs < instant(points[i].at)) continue;

      if (i < points.length - 1) {
        const next = points[i + 1];
        return {
          currentPrayer: points[i].name,
          nextPrayer: next.name,
          nextPrayerTime: next.time,
          msUntilNext: Math.max(0, instant(next.at) - nowMs),
          isAfterIsha: false,
        };
      }

      const fajrTime = tomorrowFajr ?? times.Fajr;
      const fajrAt = this.timeOnDate(fajrTime, addDays(zonedNow, 1));
      return {
        currentPrayer: 'Isha',
        nextPrayer: 'Fajr',
        nextPrayerTime: fajrTime,
        msUntilNext: Math.max(0, instant(fajrAt) - nowMs),
        isAfterIsha: true,
      };
    }

    return {
      currentPrayer: 'Isha',
      nextPrayer: 'Fajr',
      nextPrayerTime: times.Fajr,
      msUntilNext: Math.max(0, instant(points[0].at) - nowMs),
      isAfterIsha: false,
    };
  }

  private knownZone(timeZone: string | null): string | null {
    if (!timeZone) return null;
    return isValid(toZonedTime(new Date(0), timeZone)) ? timeZone : null;
  }

  /**
   * Format milliseconds as "HH:mm:ss". Hours are not capped at 24.
   */
  formatCountdown(ms: number): string {
    if (ms <= 0) return '00:00:00';

    const totalSeconds = Math.floor(ms / 1000);
    const hours = Math.floor(totalSeconds / 3600);
    const minutes = Math.floor((totalSeconds % 3600) / 60);
    const seconds = totalSeconds % 60;

    return [hours, minutes, seconds].map((n) => String(n).padStart(2, '0')).join(':');
  }

  /**
   * Render an "HH:mm" time in the user's preferred format.
   * 12h output has no leading zero: "5:07 AM".
   */
  formatTimeForDisplay(time: string, timeFormat: TimeFormat): string {
    if (timeFormat === '24h') return time;

    const at = this.timeOnDate(time, new Date(2000, 0, 1));
    return format(at, 'h:mm a');
  }
}
