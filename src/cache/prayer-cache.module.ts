import { Module } from '@nestjs/common';

import { PrayerCacheService } from './prayer-cache.service';

/**
 * Prayer Cache Module
 *
 * Date-stamped JSON cache of the last successful fetch, used when the network fails.
 */
@Module({
  providers: [PrayerCacheService],
  exports: [PrayerCacheService],
})
export class PrayerCacheModule {}
