import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { NotifierPreference } from '../config/configuration';
import { OutputModule } from '../output/output.module';
import { PrayerApiModule } from '../prayer-api/prayer-api.module';
import { PrayerTimeModule } from '../prayer-time/prayer-time.module';

import { createHostNotifier } from './host-notifier';
import { NotificationListener } from './notification.listener';
import { HOST_NOTIFIER } from './notify.constants';
import { NotifyService } from './notify.service';

/**
 * Notify Module
 *
 * Background daemon that announces each prayer as it arrives.
 * Relies on ScheduleModule and EventEmitterModule registered at the root.
 */
@Module({
  imports: [PrayerApiModule, PrayerTimeModule, OutputModule],
  providers: [
    {
      provide: HOST_NOTIFIER,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        createHostNotifier(configService.getOrThrow<NotifierPreference>('notify.notifier')),
    },
    NotifyService,
    NotificationListener,
  ],
  exports: [NotifyService],
})
export class NotifyModule {}
