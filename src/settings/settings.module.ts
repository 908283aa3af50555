import { Module } from '@nestjs/common';

import { SettingsService } from './settings.service';

/**
 * Settings Module
 *
 * Persists location, prayer source and time format as a JSON file.
 */
@Module({
  providers: [SettingsService],
  exports: [SettingsService],
})
export class SettingsModule {}
