import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';

import { HTTP_CLIENT, USER_AGENT } from './http.constants';

/**
 * HTTP Module
 *
 * Provides one axios instance with the CLI's timeout and User-Agent,
 * shared by the prayer time and location clients.
 */
@Module({
  providers: [
    {
      provide: HTTP_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        axios.create({
          timeout: configService.getOrThrow<number>('api.timeoutMs'),
          headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
        }),
    },
  ],
  exports: [HTTP_CLIENT],
})
export class HttpModule {}
