import { Injectable } from '@nestjs/common';

import { PresenterService } from '../../output/presenter.service';
import { TerminalService } from '../../output/terminal.service';
import { PrayerApiService } from '../../prayer-api/prayer-api.service';
import { PrayerTimeService } from '../../prayer-time/prayer-time.service';
import { SettingsService } from '../../settings/settings.service';

/**
 * Default command: today's prayer table.
 */
@Injectable()
export class TodayCommand {
  constructor(
    private readonly settings: SettingsService,
    private readonly prayerApi: PrayerApiService,
    private readonly prayerTime: PrayerTimeService,
    private readonly presenter: PresenterService,
    private readonly terminal: TerminalService,
  ) {}

  async run(now: Date = new Date()): Promise<void> {
    const settings = await this.settings.load();
    const bundle = await this.prayerApi.fetchBundle(settings.location, settings.prayerSource, now);
    const info = this.prayerTime.getCurrentPrayerInfo(
      bundle.times,
      bundle.tomorrowFajr,
      bundle.timeZone,
      now,
    );

    const lines = this.presenter.renderToday(settings.location, bundle, info, settings.timeFormat, now);
    lines.forEach((line) => this.terminal.print(line));
  }
}
