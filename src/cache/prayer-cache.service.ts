import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { format } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';

import { DIYANET_TIME_ZONE, PrayerSource, PrayerTimes } from '../common/types/prayer';
import { atomicWriteJson, readTextFile } from '../common/utils/atomic-write';
import { Location } from '../location/location.schema';

import { CacheEntry, cacheEntrySchema, cacheFileSchema } from './prayer-cache.schema';

export interface CacheableBundle {
  times: PrayerTimes;
  tomorrowFajr: string;
  timeZone: string | null;
}

/**
 * Persists the last successful fetch per location and source.
 * Entries are only served for the date they were fetched for.
 */
@Injectable()
export class PrayerCacheService {
  private readonly logger = new Logger(PrayerCacheService.name);
  readonly filePath: string;

  constructor(private readonly configService: ConfigService) {
    this.filePath = this.configService.getOrThrow<string>('paths.cache');
  }

  cacheKey(location: Location, source: PrayerSource): string {
    return `${location.city}-${location.countryCode}-${location.lat.toFixed(5)}-${location.lon.toFixed(5)}-${source}`;
  }

  /**
   * Today's date (YYYY-MM-DD) in the zone the entry's times belong to.
   */
  dateKey(timeZone: string | null, source: PrayerSource, now: Date = new Date()): string {
    const zone = timeZone ?? (source === 'diyanet' ? DIYANET_TIME_ZONE : null);

    if (zone) {
      try {
        return formatInTimeZone(now, zone, 'yyyy-MM-dd');
      } catch {
        this.logger.debug(`Unknown time zone "${zone}", using host date`);
      }
    }

    return format(now, 'yyyy-MM-dd');
  }

  /**
   * Cached entry for this location and source, if it was fetched for today.
   */
  async findForToday(
    location: Location,
    source: PrayerSource,
    now: Date = new Date(),
  ): Promise<CacheEntry | null> {
    const data = await this.readAll();
    const parsed = cacheEntrySchema.safeParse(data[this.cacheKey(location, source)]);

    if (!parsed.success) {
      return null;
    }

    const entry = parsed.data;
    const today = this.dateKey(entry.timeZone, source, now);
    if (entry.date !== today) {
      this.logger.debug(`Cached entry is for ${entry.date}, today is ${today}`);
      return null;
    }

    return entry;
  }

  /**
   * Replace the entry for this location and source.
   */
  async store(
    location: Location,
    source: PrayerSource,
    bundle: CacheableBundle,
    now: Date = new Date(),
  ): Promise<CacheEntry> {
    const data = await this.readAll();

    const entry: CacheEntry = {
      times: bundle.times,
      tomorrowFajr: bundle.tomorrowFajr,
      timeZone: bundle.timeZone,
      date: this.dateKey(bundle.timeZone, source, now),
      fetchedAt: now.toISOString(),
    };

    data[this.cacheKey(location, source)] = entry;
    await atomicWriteJson(this.filePath, data);
    this.logger.debug(`Cached prayer times for ${entry.date}`);

    return entry;
  }

  /**
   * Read the whole cache file. A missing, unreadable or corrupt file is an empty cache.
   */
  private async readAll(): Promise<Record<string, unknown>> {
    let raw: string | null;
    try {
      raw = await readTextFile(this.filePath);
    } catch (error) {
      this.logger.warn(`Cannot read cache file ${this.filePath}: ${String(error)}`);
      return {};
    }

    if (raw === null) return {};

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(`Ignoring corrupt cache file ${this.filePath}: ${String(error)}`);
      return {};
    }

    const parsed = cacheFileSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn(`Ignoring cache file ${this.filePath} with unexpected shape`);
      return {};
    }

    return parsed.data;
  }
}
