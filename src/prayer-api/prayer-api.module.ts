import { Module } from '@nestjs/common';

import { PrayerCacheModule } from '../cache/prayer-cache.module';
import { HttpModule } from '../http/http.module';
import { LocationModule } from '../location/location.module';
import { PrayerTimeModule } from '../prayer-time/prayer-time.module';

import { AladhanClient } from './aladhan.client';
import { DiyanetClient } from './diyanet.client';
import { PrayerApiService } from './prayer-api.service';

/**
 * Prayer API Module
 *
 * Diyanet and AlAdhan clients behind one fetch-with-cache-fallback service.
 */
@Module({
  imports: [HttpModule, LocationModule, PrayerCacheModule, PrayerTimeModule],
  providers: [DiyanetClient, AladhanClient, PrayerApiService],
  exports: [PrayerApiService],
})
export class PrayerApiModule {}
