import { Module } from '@nestjs/common';

import { HttpModule } from '../http/http.module';

import { LocationService } from './location.service';

/**
 * Location Module
 *
 * Built-in city catalogue, nearest-city lookup, IP detection and place search.
 */
@Module({
  imports: [HttpModule],
  providers: [LocationService],
  exports: [LocationService],
})
export class LocationModule {}
