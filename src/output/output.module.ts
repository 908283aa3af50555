import { Module } from '@nestjs/common';

import { PrayerTimeModule } from '../prayer-time/prayer-time.module';

import { PresenterService } from './presenter.service';
import { TerminalService } from './terminal.service';

/**
 * Output Module
 *
 * Terminal writer and the renderers for the prayer table and countdown panel.
 */
@Module({
  imports: [PrayerTimeModule],
  providers: [TerminalService, PresenterService],
  exports: [TerminalService, PresenterService],
})
export class OutputModule {}
