import { Test, TestingModule } from '@nestjs/testing';

import { PrayerTimes } from '../common/types/prayer';

import { PrayerTimeService } from './prayer-time.service';

describe('PrayerTimeService', () => {
  let service: PrayerTimeService;

  // Istanbul has no DST, so UTC+3 all year
  const zone = 'Europe/Istanbul';
  const times: PrayerTimes = {
    Fajr: '05:00',
    Sunrise: '06:30',
    Dhuhr: '12:30',
    Asr: '16:00',
    Maghrib: '19:00',
    Isha: '20:30',
  };

  /** Instant for a wall-clock time in Istanbul on 2026-06-15 */
  const istanbul = (hhmmss: string) => new Date(`2026-06-15T${hhmmss}+03:00`);

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [PrayerTimeService],
    }).compile();

    service = module.get<PrayerTimeService>(PrayerTimeService);
  });

  describe('toHHmm', () => {
    it('should pad single-digit hours', () => {
      expect(service.toHHmm('5:07')).toBe('05:07');
    });

    it('should ignore suffixes and seconds', () => {
      expect(service.toHHmm('05:07 (+03)')).toBe('05:07');
      expect(service.toHHmm('17:45:00')).toBe('17:45');
    });

    it('should reject values without a valid time of day', () => {
      expect(service.toHHmm('')).toBeNull();
      expect(service.toHHmm('noon')).toBeNull();
      expect(service.toHHmm('24:00')).toBeNull();
      expect(service.toHHmm('12:60')).toBeNull();
    });
  });

  describe('getCurrentPrayerInfo', () => {
    it('should pick the first prayer after now', () => {
      const info = service.getCurrentPrayerInfo(times, '04:59', zone, istanbul('12:00:00'));

      expect(info).toEqual({
        currentPrayer: 'Sunrise',
        nextPrayer: 'Dhuhr',
        nextPrayerTime: '12:30',
        msUntilNext: 30 * 60 * 1000,
        isAfterIsha: false,
      });
    });

    it('should treat a prayer as current from its exact minute', () => {
      const info = service.getCurrentPrayerInfo(times, '04:59', zone, istanbul('16:00:00'));

      expect(info.currentPrayer).toBe('Asr');
      expect(info.nextPrayer).toBe('Maghrib');
      expect(info.msUntilNext).toBe(3 * 60 * 60 * 1000);
    });

    it("should roll over to tomorrow's Fajr after Isha", () => {
      const info = service.getCurrentPrayerInfo(times, '04:59', zone, istanbul('22:00:00'));

      expect(info).toEqual({
        currentPrayer: 'Isha',
        nextPrayer: 'Fajr',
        nextPrayerTime: '04:59',
        msUntilNext: (6 * 60 + 59) * 60 * 1000,
        isAfterIsha: true,
      });
    });

    it("should use today's Fajr time after Isha when tomorrow's is unknown", () => {
      const info = service.getCurrentPrayerInfo(times, null, zone, istanbul('22:00:00'));

      expect(info.nextPrayerTime).toBe('05:00');
      expect(info.msUntilNext).toBe(7 * 60 * 60 * 1000);
      expect(info.isAfterIsha).toBe(true);
    });

    it("should count down to today's Fajr before dawn", () => {
      const info = service.getCurrentPrayerInfo(times, '04:59', zone, istanbul('03:15:30'));

      expect(info).toEqual({
        currentPrayer: 'Isha',
        nextPrayer: 'Fajr',
        nextPrayerTime: '05:00',
        msUntilNext: (104 * 60 + 30) * 1000,
        isAfterIsha: false,
      });
    });

    it('should compare against wall-clock time in the given zone', () => {
      // 09:00 UTC is 12:00 in Istanbul
      const info = service.getCurrentPrayerInfo(times, '04:59', zone, new Date('2026-06-15T09:00:00Z'));

      expect(info.nextPrayer).toBe('Dhuhr');
    });

    it('should count the clock change overnight toward Fajr', () => {
      // 21:00 EST on 2026-03-07; clocks go forward at 02:00, Fajr at 06:00 EDT is 10:00 UTC
      const info = service.getCurrentPrayerInfo(
        times,
        '06:00',
        'America/New_York',
        new Date('2026-03-08T02:00:00Z'),
      );

      expect(info.isAfterIsha).toBe(true);
      expect(info.msUntilNext).toBe(8 * 60 * 60 * 1000);
    });
  });

  describe('getZonedDate', () => {
    it('should return the calendar date in the zone', () => {
      expect(service.getZonedDate(zone, new Date('2026-06-15T22:30:00Z'))).toBe('2026-06-16');
    });
  });

  describe('formatCountdown', () => {
    it('should format as HH:mm:ss', () => {
      expect(service.formatCountdown(3_723_000)).toBe('01:02:03');
    });

    it('should drop partial seconds', () => {
      expect(service.formatCountdown(59_999)).toBe('00:00:59');
    });

    it('should not wrap hours past a day', () => {
      expect(service.formatCountdown(90_061_000)).toBe('25:01:01');
    });

    it('should clamp negative and zero durations', () => {
      expect(service.formatCountdown(0)).toBe('00:00:00');
      expect(service.formatCountdown(-5_000)).toBe('00:00:00');
    });
  });

  describe('formatTimeForDisplay', () => {
    it('should leave 24h times unchanged', () => {
      expect(service.formatTimeForDisplay('05:07', '24h')).toBe('05:07');
    });

    it('should convert to 12h without a leading zero', () => {
      expect(service.formatTimeForDisplay('05:07', '12h')).toBe('5:07 AM');
      expect(service.formatTimeForDisplay('17:45', '12h')).toBe('5:45 PM');
      expect(service.formatTimeForDisplay('00:15', '12h')).toBe('12:15 AM');
      expect(service.formatTimeForDisplay('12:30', '12h')).toBe('12:30 PM');
    });
  });
});
