import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { formatIssues, SettingsError, SettingsNotFoundError } from '../common/errors';
import { atomicWriteJson, readTextFile } from '../common/utils/atomic-write';

import { Settings, settingsSchema } from './settings.schema';

/**
 * Reads and writes the user settings file.
 * A malformed file is reported, never silently replaced.
 */
@Injectable()
export class SettingsService {
  private readonly logger = new Logger(SettingsService.name);
  readonly filePath: string;

  constructor(private readonly configService: ConfigService) {
    this.filePath = this.configService.getOrThrow<string>('paths.settings');
  }

  /**
   * Load settings, failing if none have been saved yet.
   */
  async load(): Promise<Settings> {
    const settings = await this.loadOrNull();
    if (!settings) {
      throw new SettingsNotFoundError(this.filePath);
    }
    return settings;
  }

  /**
   * Load settings, or null if the file doesn't exist.
   */
  async loadOrNull(): Promise<Settings | null> {
    const raw = await readTextFile(this.filePath);
    if (raw === null) {
      this.logger.debug(`No settings file at ${this.filePath}`);
      return null;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SettingsError(`Configuration file ${this.filePath} is not valid JSON: ${reason}`);
    }

    return this.validate(data);
  }

  /**
   * Validate and persist settings. Returns what was written.
   */
  async save(settings: Settings): Promise<Settings> {
    const validated = this.validate(settings);
    await atomicWriteJson(this.filePath, validated);
    this.logger.debug(`Saved settings to ${this.filePath}`);
    return validated;
  }

  private validate(data: unknown): Settings {
    const result = settingsSchema.safeParse(data);

    if (!result.success) {
      throw new SettingsError(
        `Invalid configuration in ${this.filePath}:\n${formatIssues(result.error.errors)}\n` +
          'Run "miqat config" to fix it.',
      );
    }

    return result.data;
  }
}
