import { Module } from '@nestjs/common';

import { LocationModule } from '../location/location.module';
import { NotifyModule } from '../notify/notify.module';
import { OutputModule } from '../output/output.module';
import { PrayerApiModule } from '../prayer-api/prayer-api.module';
import { PrayerTimeModule } from '../prayer-time/prayer-time.module';
import { SettingsModule } from '../settings/settings.module';

import { ConfigCommand } from './commands/config.command';
import { NextCommand } from './commands/next.command';
import { NotifyCommand } from './commands/notify.command';
import { TodayCommand } from './commands/today.command';
import { CompletionService } from './completion/completion.service';
import { ClackPrompter } from './prompts/clack-prompter';
import { PROMPTER } from './prompts/prompts.constants';

/**
 * CLI Module
 *
 * One injectable per command, resolved by the commander program.
 */
@Module({
  imports: [SettingsModule, LocationModule, PrayerApiModule, PrayerTimeModule, OutputModule, NotifyModule],
  providers: [
    TodayCommand,
    NextCommand,
    ConfigCommand,
    NotifyCommand,
    CompletionService,
    {
      provide: PROMPTER,
      useClass: ClackPrompter,
    },
  ],
  exports: [TodayCommand, NextCommand, ConfigCommand, NotifyCommand, CompletionService],
})
export class CliModule {}
