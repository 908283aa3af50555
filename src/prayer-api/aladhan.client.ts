import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosInstance } from 'axios';
import { addDays, getUnixTime } from 'date-fns';
import { z } from 'zod';

import { PrayerApiError } from '../common/errors';
import { HTTP_CLIENT } from '../http/http.constants';
import { Location } from '../location/location.schema';
import { PrayerTimeService } from '../prayer-time/prayer-time.service';

import { FetchedPrayerTimes } from './prayer-api.types';
import { describeError, requireTimeField } from './time-fields';

/** Muslim World League */
export const ALADHAN_METHOD = 3;

/** Hanafi Asr */
export const ALADHAN_SCHOOL = 1;

const timingsResponseSchema = z.object({
  data: z.object({
    timings: z.record(z.string(), z.unknown()),
    meta: z
      .object({
        timezone: z.string().optional(),
      })
      .optional(),
  }),
});

type TimingsResponse = z.infer<typeof timingsResponseSchema>;

/**
 * Client for the AlAdhan timings API (worldwide, coordinate based).
 */
@Injectable()
export class AladhanClient {
  private readonly logger = new Logger(AladhanClient.name);
  private readonly baseUrl: string;

  constructor(
    private readonly configService: ConfigService,
    @Inject(HTTP_CLIENT) private readonly http: AxiosInstance,
    private readonly prayerTime: PrayerTimeService,
  ) {
    this.baseUrl = this.configService.getOrThrow<string>('api.aladhanBaseUrl');
  }

  /**
   * Today's times plus tomorrow's Fajr, from two timings requests a day apart.
   */
  async fetchTimes(location: Location, now: Date = new Date()): Promise<FetchedPrayerTimes> {
    const today = await this.fetchTimings(location, now, 'Failed to fetch prayer times');
    const tomorrow = await this.fetchTimings(
      location,
      addDays(now, 1),
      "Failed to fetch tomorrow's prayer times",
    );

    const timings = today.data.timings;
    return {
      times: {
        Fajr: requireTimeField(this.prayerTime, timings, 'Fajr'),
        Sunrise: requireTimeField(this.prayerTime, timings, 'Sunrise'),
        Dhuhr: requireTimeField(this.prayerTime, timings, 'Dhuhr'),
        Asr: requireTimeField(this.prayerTime, timings, 'Asr'),
        Maghrib: requireTimeField(this.prayerTime, timings, 'Maghrib'),
        Isha: requireTimeField(this.prayerTime, timings, 'Isha'),
      },
      tomorrowFajr: requireTimeField(this.prayerTime, tomorrow.data.timings, 'Fajr'),
      timeZone: today.data.meta?.timezone ?? null,
    };
  }

  private async fetchTimings(
    location: Location,
    date: Date,
    failureMessage: string,
  ): Promise<TimingsResponse> {
    const url = `${this.baseUrl}/timings/${getUnixTime(date)}`;
    this.logger.debug(`GET ${url} (${location.lat}, ${location.lon})`);

    let payload: unknown;
    try {
      const response = await this.http.get<unknown>(url, {
        params: {
          latitude: location.lat,
          longitude: location.lon,
          method: ALADHAN_METHOD,
          school: ALADHAN_SCHOOL,
        },
      });
      payload = response.data;
    } catch (error) {
      throw new PrayerApiError(`${failureMessage}: ${describeError(error)}`, { cause: error });
    }

    // axios hands back the raw text when the body is not JSON
    if (typeof payload === 'string') {
      throw new PrayerApiError('Invalid response from AlAdhan');
    }

    const parsed = timingsResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new PrayerApiError('Unexpected response format from AlAdhan');
    }

    return parsed.data;
  }
}
