import { Injectable, Logger } from '@nestjs/common';
import { erase } from 'sisteransi';

import { PrayerApiError } from '../../common/errors';
import { PresenterService } from '../../output/presenter.service';
import { TerminalService } from '../../output/terminal.service';
import { PrayerBundle } from '../../prayer-api/prayer-api.types';
import { PrayerApiService } from '../../prayer-api/prayer-api.service';
import { PrayerTimeService } from '../../prayer-time/prayer-time.service';
import { Settings } from '../../settings/settings.schema';
import { SettingsService } from '../../settings/settings.service';
import { waitForShutdownSignal } from '../shutdown';

export interface NextOptions {
  once?: boolean;
}

const TICK_MS = 1_000;
/** Refetch once the countdown is this close to zero */
const REFRESH_WITHIN_MS = 1_000;

/**
 * `miqat next`: countdown to the next prayer, redrawn every second.
 */
@Injectable()
export class NextCommand {
  private readonly logger = new Logger(NextCommand.name);

  private settings: Settings | null = null;
  private bundle: PrayerBundle | null = null;
  /** Date the current times belong to, in their own zone */
  private bundleDate: string | null = null;

  constructor(
    private readonly settingsService: SettingsService,
    private readonly prayerApi: PrayerApiService,
    private readonly prayerTime: PrayerTimeService,
    private readonly presenter: PresenterService,
    private readonly terminal: TerminalService,
  ) {}

  async run(options: NextOptions = {}, now: Date = new Date(), stopSignal?: Promise<unknown>): Promise<void> {
    this.settings = await this.settingsService.load();
    this.useBundle(await this.prayerApi.fetchBundle(this.settings.location, this.settings.prayerSource, now), now);

    if (options.once) {
      const lines = await this.tick(now);
      lines.forEach((line) => this.terminal.print(line));
      return;
    }

    await this.runLive(stopSignal ?? waitForShutdownSignal());
  }

  /**
   * Panel lines for one moment. Refetches first when the countdown has run out
   * or the day has changed since the times were fetched.
   */
  async tick(now: Date = new Date()): Promise<string[]> {
    const { settings, bundle, bundleDate } = this.requireState();

    const dayChanged = this.prayerTime.getZonedDate(bundle.timeZone, now) !== bundleDate;
    const due =
      this.prayerTime.getCurrentPrayerInfo(bundle.times, bundle.tomorrowFajr, bundle.timeZone, now).msUntilNext <=
      REFRESH_WITHIN_MS;

    if (dayChanged || due) {
      try {
        this.useBundle(await this.prayerApi.fetchBundle(settings.location, settings.prayerSource, now), now);
      } catch (error) {
        if (!(error instanceof PrayerApiError)) throw error;
        this.logger.warn(`Refresh failed, keeping current times: ${error.message}`);
        if (dayChanged) {
          // Yesterday's times stand in for today's, with the Fajr already known
          this.useBundle({ ...bundle, times: { ...bundle.times, Fajr: bundle.tomorrowFajr } }, now);
        }
      }
    }

    const current = this.requireState().bundle;
    const info = this.prayerTime.getCurrentPrayerInfo(current.times, current.tomorrowFajr, current.timeZone, now);
    return this.presenter.renderNext(settings.location, current, info, settings.timeFormat);
  }

  private async runLive(stopSignal: Promise<unknown>): Promise<void> {
    let drawn = 0;
    let drawing = false;

    const draw = async () => {
      const lines = await this.tick();
      if (drawn > 0 && this.terminal.isInteractive) {
        this.terminal.write(erase.lines(drawn + 1));
      }
      lines.forEach((line) => this.terminal.print(line));
      drawn = lines.length;
    };

    await draw();

    await new Promise<void>((resolve, reject) => {
      const timer = setInterval(() => {
        // A slow refetch holds the panel; skip ticks until it lands
        if (drawing) return;
        drawing = true;
        void draw().then(
          () => {
            drawing = false;
          },
          (error: unknown) => {
            clearInterval(timer);
            reject(error);
          },
        );
      }, TICK_MS);

      void stopSignal.then(
        () => {
          clearInterval(timer);
          resolve();
        },
        (error: unknown) => {
          clearInterval(timer);
          reject(error);
        },
      );
    });

    this.terminal.print('');
  }

  private useBundle(bundle: PrayerBundle, now: Date): void {
    this.bundle = bundle;
    this.bundleDate = this.prayerTime.getZonedDate(bundle.timeZone, now);
  }

  private requireState(): { settings: Settings; bundle: PrayerBundle; bundleDate: string | null } {
    if (!this.settings || !this.bundle) {
      throw new Error('NextCommand.tick() called before run()');
    }
    return { settings: this.settings, bundle: this.bundle, bundleDate: this.bundleDate };
  }
}
