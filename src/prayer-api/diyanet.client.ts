import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosInstance } from 'axios';
import { addDays } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { z } from 'zod';

import { PrayerApiError } from '../common/errors';
import { DIYANET_TIME_ZONE } from '../common/types/prayer';
import { HTTP_CLIENT } from '../http/http.constants';
import { PrayerTimeService } from '../prayer-time/prayer-time.service';

import { FetchedPrayerTimes } from './prayer-api.types';
import { describeError, requireTimeField } from './time-fields';

const diyanetDaysSchema = z.array(z.record(z.string(), z.unknown()));

type DiyanetDay = z.infer<typeof diyanetDaysSchema>[number];

/**
 * Client for the Diyanet prayer time feed.
 *
 * One request returns a list of days for a district; each day carries its
 * Gregorian date in `MiladiTarihKisa` ("18.10.2026") and the six times under
 * Turkish field names.
 */
@Injectable()
export class DiyanetClient {
  private readonly logger = new Logger(DiyanetClient.name);
  private readonly baseUrl: string;

  constructor(
    private readonly configService: ConfigService,
    @Inject(HTTP_CLIENT) private readonly http: AxiosInstance,
    private readonly prayerTime: PrayerTimeService,
  ) {
    this.baseUrl = this.configService.getOrThrow<string>('api.diyanetBaseUrl');
  }

  /**
   * Today's times and tomorrow's Fajr for a district, dates taken in Turkish time.
   */
  async fetchTimes(ilceId: string, now: Date = new Date()): Promise<FetchedPrayerTimes> {
    const days = await this.fetchDays(ilceId);

    const today = this.findDay(days, formatInTimeZone(now, DIYANET_TIME_ZONE, 'yyyy-MM-dd'));
    if (!today) {
      throw new PrayerApiError("Could not find today's prayer times");
    }

    const tomorrow = this.findDay(days, formatInTimeZone(addDays(now, 1), DIYANET_TIME_ZONE, 'yyyy-MM-dd'));
    if (!tomorrow) {
      throw new PrayerApiError("Could not find tomorrow's prayer times");
    }

    return {
      times: {
        Fajr: requireTimeField(this.prayerTime, today, 'Imsak'),
        Sunrise: requireTimeField(this.prayerTime, today, 'Gunes'),
        Dhuhr: requireTimeField(this.prayerTime, today, 'Ogle'),
        Asr: requireTimeField(this.prayerTime, today, 'Ikindi'),
        Maghrib: requireTimeField(this.prayerTime, today, 'Aksam'),
        Isha: requireTimeField(this.prayerTime, today, 'Yatsi'),
      },
      tomorrowFajr: requireTimeField(this.prayerTime, tomorrow, 'Imsak'),
      timeZone: DIYANET_TIME_ZONE,
    };
  }

  private async fetchDays(ilceId: string): Promise<DiyanetDay[]> {
    const url = `${this.baseUrl}/${encodeURIComponent(ilceId)}`;
    this.logger.debug(`GET ${url}`);

    let body: string;
    try {
      // The feed may prefix its JSON with a BOM, so parse it ourselves.
      const response = await this.http.get<string>(url, { responseType: 'text' });
      body = response.data;
    } catch (error) {
      throw new PrayerApiError(`Failed to fetch prayer times from Diyanet: ${describeError(error)}`, {
        cause: error,
      });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body.replace(/^\uFEFF/, ''));
    } catch (error) {
      throw new PrayerApiError('Invalid response from Diyanet', { cause: error });
    }

    const parsed = diyanetDaysSchema.safeParse(payload);
    if (!parsed.success) {
      throw new PrayerApiError('Unexpected Diyanet response');
    }

    return parsed.data;
  }

  /**
   * Find the entry for a YYYY-MM-DD date. Diyanet writes dates day-first.
   */
  private findDay(days: DiyanetDay[], isoDate: string): DiyanetDay | null {
    const [year, month, day] = isoDate.split('-').map((part) => parseInt(part, 10));

    return (
      days.find((entry) => {
        const raw = entry.MiladiTarihKisa;
        if (typeof raw !== 'string') return false;

        const parts = raw.match(/\d+/g);
        if (!parts || parts.length < 3) return false;

        const [d, m, y] = parts.map((part) => parseInt(part, 10));
        return d === day && m === month && y === year;
      }) ?? null
    );
  }
}
