import { Module } from '@nestjs/common';

import { PrayerTimeService } from './prayer-time.service';

/**
 * Prayer Time Module
 *
 * Next-prayer selection, countdowns and time-of-day formatting.
 */
@Module({
  providers: [PrayerTimeService],
  exports: [PrayerTimeService],
})
export class PrayerTimeModule {}
