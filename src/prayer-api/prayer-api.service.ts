import { Injectable, Logger } from '@nestjs/common';

import { PrayerCacheService } from '../cache/prayer-cache.service';
import { PrayerApiError } from '../common/errors';
import { PrayerSource } from '../common/types/prayer';
import { Location } from '../location/location.schema';
import { LocationService } from '../location/location.service';

import { AladhanClient } from './aladhan.client';
import { DiyanetClient } from './diyanet.client';
import { FetchedPrayerTimes, PrayerBundle } from './prayer-api.types';
import { isTurkiyeLocation, resolvePrayerSource, TURKEY_COUNTRY_CODE } from './source-resolution';

/**
 * Fetches today's prayer times from the source that applies to a location,
 * caching each success and falling back to today's cached copy on failure.
 */
@Injectable()
export class PrayerApiService {
  private readonly logger = new Logger(PrayerApiService.name);

  constructor(
    private readonly diyanet: DiyanetClient,
    private readonly aladhan: AladhanClient,
    private readonly cache: PrayerCacheService,
    private readonly locations: LocationService,
  ) {}

  async fetchBundle(
    location: Location,
    requestedSource: PrayerSource,
    now: Date = new Date(),
  ): Promise<PrayerBundle> {
    const resolvedSource = resolvePrayerSource(location, requestedSource);
    if (resolvedSource !== requestedSource) {
      this.logger.debug(`${location.countryCode} is outside Turkey, using ${resolvedSource}`);
    }

    let fetched: FetchedPrayerTimes;
    try {
      fetched = await this.fetchLive(location, resolvedSource, now);
    } catch (error) {
      if (!(error instanceof PrayerApiError)) throw error;

      this.logger.warn(`${error.message}; trying cached times`);
      const cached = await this.cache.findForToday(location, resolvedSource, now);
      if (!cached) {
        throw new PrayerApiError(`${error.message}. No cached prayer times for today.`, {
          cause: error,
        });
      }

      return {
        times: cached.times,
        tomorrowFajr: cached.tomorrowFajr,
        timeZone: cached.timeZone,
        requestedSource,
        resolvedSource,
        fromCache: true,
      };
    }

    try {
      await this.cache.store(location, resolvedSource, fetched, now);
    } catch (error) {
      this.logger.warn(`Could not update the prayer time cache: ${String(error)}`);
    }

    return { ...fetched, requestedSource, resolvedSource, fromCache: false };
  }

  /**
   * District id for a Turkish location: the configured one, else the nearest
   * catalogue city's.
   */
  resolveDiyanetIlceId(location: Location): string | null {
    if (location.diyanetIlceId) return location.diyanetIlceId;
    if (!isTurkiyeLocation(location)) return null;

    const nearest = this.locations.findNearest(location.lat, location.lon, TURKEY_COUNTRY_CODE);
    return nearest?.diyanetIlceId ?? null;
  }

  private async fetchLive(
    location: Location,
    source: PrayerSource,
    now: Date,
  ): Promise<FetchedPrayerTimes> {
    if (source === 'mwl') {
      return this.aladhan.fetchTimes(location, now);
    }

    const ilceId = this.resolveDiyanetIlceId(location);
    if (!ilceId) {
      throw new PrayerApiError('Failed to resolve Diyanet location');
    }
    return this.diyanet.fetchTimes(ilceId, now);
  }
}
