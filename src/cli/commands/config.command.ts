import { Inject, Injectable, Logger } from '@nestjs/common';

import { CliUsageError, SettingsError } from '../../common/errors';
import {
  isPrayerSource,
  isTimeFormat,
  PRAYER_SOURCES,
  PrayerSource,
  SOURCE_LABELS,
  TIME_FORMATS,
  TimeFormat,
} from '../../common/types/prayer';
import { Location } from '../../location/location.schema';
import { LocationService } from '../../location/location.service';
import { TerminalService } from '../../output/terminal.service';
import { Settings } from '../../settings/settings.schema';
import { SettingsService } from '../../settings/settings.service';
import { IPrompter } from '../prompts/prompter.interface';
import { PROMPTER } from '../prompts/prompts.constants';

export interface ConfigOptions {
  show?: boolean;
  city?: string;
  country?: string;
  countryCode?: string;
  lat?: string;
  lon?: string;
  addressLabel?: string;
  diyanetIlceId?: string;
  method?: string;
  timeFormat?: string;
  autoLocation?: boolean;
  search?: string;
  searchIndex?: string;
}

type LocationMode = 'keep' | 'auto' | 'search' | 'manual';

const MANUAL_FLAGS = ['city', 'country', 'countryCode', 'lat', 'lon'] as const;
const SEARCH_LIMIT = 5;

/**
 * `miqat config`: show, update by flags, or set up interactively.
 */
@Injectable()
export class ConfigCommand {
  private readonly logger = new Logger(ConfigCommand.name);

  constructor(
    private readonly settings: SettingsService,
    private readonly locations: LocationService,
    private readonly terminal: TerminalService,
    @Inject(PROMPTER) private readonly prompter: IPrompter,
  ) {}

  async run(options: ConfigOptions = {}): Promise<void> {
    const hasUpdates = this.hasUpdateFlags(options);

    if (options.show && !hasUpdates) {
      const existing = await this.settings.load();
      this.printSettings(existing);
      return;
    }

    const existing = await this.loadExisting(hasUpdates);

    const saved = hasUpdates
      ? await this.settings.save(await this.applyFlags(options, existing))
      : await this.settings.save(await this.runInteractive(existing));

    this.terminal.print(this.terminal.colors.green('Configuration saved.'));
    this.printSettings(saved);
  }

  /**
   * A broken file blocks partial updates; a full rewrite may replace it,
   * after telling the user what was wrong.
   */
  private async loadExisting(hasUpdates: boolean): Promise<Settings | null> {
    try {
      return await this.settings.loadOrNull();
    } catch (error) {
      if (!(error instanceof SettingsError) || hasUpdates) throw error;

      this.terminal.error(error.message);
      this.terminal.print('Starting a fresh configuration.');
      return null;
    }
  }

  private async applyFlags(options: ConfigOptions, existing: Settings | null): Promise<Settings> {
    const prayerSource = this.parseSource(options.method) ?? existing?.prayerSource ?? 'diyanet';
    const timeFormat = this.parseTimeFormat(options.timeFormat) ?? existing?.timeFormat ?? '24h';
    const isManual = MANUAL_FLAGS.some((flag) => options[flag] !== undefined);

    let location: Location | null = existing?.location ?? null;

    if (isManual) {
      location = this.manualLocation(options);
    } else if (options.search !== undefined) {
      location = await this.searchLocation(options.search, options.searchIndex);
    } else if (options.autoLocation) {
      location = await this.locations.detectFromIp();
      this.terminal.print(`Detected location: ${location.city}, ${location.country}`);
    }

    if (!location) {
      throw new CliUsageError(
        'No location configured yet. Pass --city, --country, --country-code, --lat and --lon, ' +
          'or use --auto-location or --search.',
      );
    }

    if (!isManual) {
      location = this.amendLocation(location, options);
    }

    return { location, prayerSource, timeFormat };
  }

  private manualLocation(options: ConfigOptions): Location {
    const missing = MANUAL_FLAGS.filter((flag) => !options[flag]).map(toFlagName);
    if (missing.length > 0) {
      throw new CliUsageError(
        `Manual location requires --city, --country, --country-code, --lat and --lon (missing ${missing.join(', ')}).`,
      );
    }

    return {
      city: (options.city ?? '').trim(),
      country: (options.country ?? '').trim(),
      countryCode: (options.countryCode ?? '').trim().toUpperCase(),
      lat: parseCoordinate(options.lat, 'Latitude', 90),
      lon: parseCoordinate(options.lon, 'Longitude', 180),
      addressLabel: options.addressLabel || undefined,
      diyanetIlceId: parseIlceId(options.diyanetIlceId),
    };
  }

  private amendLocation(location: Location, options: ConfigOptions): Location {
    const amended = { ...location };
    if (options.addressLabel !== undefined) {
      amended.addressLabel = options.addressLabel || undefined;
    }
    if (options.diyanetIlceId !== undefined) {
      amended.diyanetIlceId = parseIlceId(options.diyanetIlceId);
    }
    return amended;
  }

  private async searchLocation(query: string, searchIndex?: string): Promise<Location> {
    const index = searchIndex === undefined ? 1 : parseInt(searchIndex, 10);
    if (!Number.isInteger(index) || index < 1 || String(index) !== (searchIndex ?? '1').trim()) {
      throw new CliUsageError('--search-index must be a whole number starting at 1.');
    }

    const results = await this.locations.search(query, SEARCH_LIMIT);
    if (results.length === 0) {
      throw new CliUsageError(`No places found for "${query}".`);
    }
    if (index > results.length) {
      throw new CliUsageError(`--search-index out of range. Pick a number from 1 to ${results.length}.`);
    }

    const picked = results[index - 1];
    this.terminal.print(`Selected: ${picked.addressLabel ?? `${picked.city}, ${picked.country}`}`);
    return picked;
  }

  private async runInteractive(existing: Settings | null): Promise<Settings> {
    this.prompter.intro('miqat configuration');

    const location = await this.promptLocation(existing?.location ?? null);

    const prayerSource = await this.prompter.select<PrayerSource>(
      'Calculation method',
      PRAYER_SOURCES.map((source) => ({
        value: source,
        label: SOURCE_LABELS[source],
        hint: source === 'diyanet' ? 'Turkey only' : undefined,
      })),
      existing?.prayerSource ?? 'diyanet',
    );

    const timeFormat = await this.prompter.select<TimeFormat>(
      'Time format',
      TIME_FORMATS.map((value) => ({ value, label: value === '24h' ? '24-hour (17:45)' : '12-hour (5:45 PM)' })),
      existing?.timeFormat ?? '24h',
    );

    this.prompter.outro(`Saving to ${this.settings.filePath}`);
    return { location, prayerSource, timeFormat };
  }

  private async promptLocation(current: Location | null): Promise<Location> {
    const modes: { value: LocationMode; label: string }[] = [
      { value: 'auto', label: 'Detect from my IP address' },
      { value: 'search', label: 'Search for a place' },
      { value: 'manual', label: 'Enter coordinates manually' },
    ];
    if (current) {
      modes.unshift({ value: 'keep', label: `Keep ${current.city}, ${current.country}` });
    }

    const mode = await this.prompter.select('Location', modes, current ? 'keep' : 'auto');

    switch (mode) {
      case 'keep':
        if (current) return current;
        throw new CliUsageError('No location to keep.');
      case 'auto': {
        const detected = await this.locations.detectFromIp();
        this.terminal.print(`Detected location: ${detected.city}, ${detected.country}`);
        return detected;
      }
      case 'search':
        return this.promptSearch();
      case 'manual':
        return this.promptManual(current);
    }
  }

  private async promptSearch(): Promise<Location> {
    const query = await this.prompter.text('Search for a city or address', {
      placeholder: 'Istanbul',
      validate: (value) => (value.trim() ? undefined : 'Enter a place to search for'),
    });

    const results = await this.locations.search(query, SEARCH_LIMIT);
    if (results.length === 0) {
      throw new CliUsageError(`No places found for "${query}".`);
    }

    const picked = await this.prompter.select(
      'Pick a result',
      results.map((result, i) => ({
        value: String(i),
        label: result.addressLabel ?? `${result.city}, ${result.country}`,
      })),
    );
    return results[parseInt(picked, 10)];
  }

  private async promptManual(current: Location | null): Promise<Location> {
    const required = (value: string) => (value.trim() ? undefined : 'Required');

    const city = await this.prompter.text('City', { initialValue: current?.city, validate: required });
    const country = await this.prompter.text('Country', { initialValue: current?.country, validate: required });
    const countryCode = await this.prompter.text('Country code', {
      initialValue: current?.countryCode,
      validate: (value) => (/^[A-Za-z]{2,3}$/.test(value.trim()) ? undefined : 'Use a 2 or 3 letter code'),
    });
    const lat = await this.prompter.text('Latitude', {
      initialValue: current ? String(current.lat) : undefined,
      validate: coordinateValidator('Latitude', 90),
    });
    const lon = await this.prompter.text('Longitude', {
      initialValue: current ? String(current.lon) : undefined,
      validate: coordinateValidator('Longitude', 180),
    });
    const ilceId = await this.prompter.text('Diyanet district id (optional)', {
      initialValue: current?.diyanetIlceId,
      validate: (value) => (value.trim() === '' || /^\d+$/.test(value.trim()) ? undefined : 'Digits only'),
    });

    return {
      city: city.trim(),
      country: country.trim(),
      countryCode: countryCode.trim().toUpperCase(),
      lat: parseCoordinate(lat, 'Latitude', 90),
      lon: parseCoordinate(lon, 'Longitude', 180),
      diyanetIlceId: parseIlceId(ilceId),
    };
  }

  private parseSource(value?: string): PrayerSource | undefined {
    if (value === undefined) return undefined;
    const normalized = value.trim().toLowerCase();
    if (!isPrayerSource(normalized)) {
      throw new CliUsageError(`Invalid --method "${value}". Use one of: ${PRAYER_SOURCES.join(', ')}.`);
    }
    return normalized;
  }

  private parseTimeFormat(value?: string): TimeFormat | undefined {
    if (value === undefined) return undefined;
    const normalized = value.trim().toLowerCase();
    if (!isTimeFormat(normalized)) {
      throw new CliUsageError(`Invalid --time-format "${value}". Use one of: ${TIME_FORMATS.join(', ')}.`);
    }
    return normalized;
  }

  private hasUpdateFlags(options: ConfigOptions): boolean {
    return (
      MANUAL_FLAGS.some((flag) => options[flag] !== undefined) ||
      options.addressLabel !== undefined ||
      options.diyanetIlceId !== undefined ||
      options.method !== undefined ||
      options.timeFormat !== undefined ||
      options.autoLocation === true ||
      options.search !== undefined
    );
  }

  private printSettings(settings: Settings): void {
    this.terminal.print(JSON.stringify(settings, null, 2));
    this.terminal.print(this.terminal.colors.dim(`Config path: ${this.settings.filePath}`));
    this.logger.debug(`Printed settings from ${this.settings.filePath}`);
  }
}

function toFlagName(key: (typeof MANUAL_FLAGS)[number]): string {
  return `--${key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}`;
}

function parseCoordinate(value: string | undefined, label: string, limit: number): number {
  const problem = coordinateValidator(label, limit)(value ?? '');
  if (problem) {
    throw new CliUsageError(problem);
  }
  return Number((value ?? '').trim());
}

function coordinateValidator(label: string, limit: number): (value: string) => string | undefined {
  return (value) => {
    const trimmed = value.trim();
    const parsed = Number(trimmed);
    if (trimmed === '' || !Number.isFinite(parsed)) {
      return `${label} must be a number.`;
    }
    if (parsed < -limit || parsed > limit) {
      return `${label} must be between -${limit} and ${limit}.`;
    }
    return undefined;
  };
}

function parseIlceId(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;
  if (!/^\d+$/.test(trimmed)) {
    throw new CliUsageError(`Invalid --diyanet-ilce-id "${value}". Use the numeric district id.`);
  }
  return trimmed;
}
