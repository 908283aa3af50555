import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { SchedulerRegistry } from '@nestjs/schedule';

import { PrayerName } from '../common/types/prayer';
import { TerminalService } from '../output/terminal.service';
import { PrayerApiService } from '../prayer-api/prayer-api.service';
import { CurrentPrayerInfo, PrayerTimeService } from '../prayer-time/prayer-time.service';
import { Settings } from '../settings/settings.schema';

import { PrayerDueEvent } from './events/prayer-due.event';
import {
  MIN_DELAY_MS,
  NOTIFY_EVENTS,
  NOTIFY_TIMEOUT_NAME,
  RESCHEDULE_PAUSE_MS,
  RETRY_DELAY_MS,
} from './notify.constants';

/**
 * The notification currently waiting to fire.
 */
export interface ScheduledNotification {
  prayer: PrayerName;
  displayTime: string;
  dueAt: Date;
}

/**
 * Long-running notifier: waits for the next prayer, announces it,
 * then looks up the one after. Failed lookups are retried every minute.
 */
@Injectable()
export class NotifyService implements OnModuleDestroy {
  private readonly logger = new Logger(NotifyService.name);

  private settings: Settings | null = null;
  private scheduled: ScheduledNotification | null = null;

  constructor(
    private readonly prayerApi: PrayerApiService,
    private readonly prayerTime: PrayerTimeService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly eventEmitter: EventEmitter2,
    private readonly terminal: TerminalService,
  ) {}

  async start(settings: Settings): Promise<void> {
    this.settings = settings;
    await this.scheduleNext();
  }

  stop(): void {
    this.settings = null;
    this.scheduled = null;
    this.clearTimer();
  }

  onModuleDestroy(): void {
    this.stop();
  }

  get isRunning(): boolean {
    return this.settings !== null;
  }

  getScheduled(): ScheduledNotification | null {
    return this.scheduled;
  }

  /**
   * Fetch today's times and arm a timeout for the next prayer.
   */
  async scheduleNext(now: Date = new Date()): Promise<void> {
    const settings = this.settings;
    if (!settings) return;

    let info: CurrentPrayerInfo;
    try {
      const bundle = await this.prayerApi.fetchBundle(settings.location, settings.prayerSource, now);
      info = this.prayerTime.getCurrentPrayerInfo(bundle.times, bundle.tomorrowFajr, bundle.timeZone, now);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.terminal.error(`Could not load prayer times: ${reason}`);
      this.terminal.print('Retrying in 60 seconds.');
      this.scheduled = null;
      this.setTimer(RETRY_DELAY_MS, () => this.scheduleNext());
      return;
    }

    const prayer = info.nextPrayer;
    const delay = Math.max(MIN_DELAY_MS, info.msUntilNext);
    const displayTime = this.prayerTime.formatTimeForDisplay(info.nextPrayerTime, settings.timeFormat);

    this.scheduled = {
      prayer,
      displayTime,
      dueAt: new Date(now.getTime() + delay),
    };
    this.terminal.print(
      `Waiting for ${prayer} at ${displayTime} (in ${this.prayerTime.formatCountdown(delay)})`,
    );
    this.setTimer(delay, () => this.fire(prayer, displayTime));
  }

  private fire(prayer: PrayerName, displayTime: string): void {
    this.logger.debug(`${prayer} is due`);
    this.scheduled = null;
    this.eventEmitter.emit(NOTIFY_EVENTS.PRAYER_DUE, new PrayerDueEvent(prayer, displayTime));
    this.setTimer(RESCHEDULE_PAUSE_MS, () => this.scheduleNext());
  }

  private setTimer(delay: number, callback: () => Promise<void> | void): void {
    this.clearTimer();

    const timeout = setTimeout(() => {
      this.schedulerRegistry.deleteTimeout(NOTIFY_TIMEOUT_NAME);
      Promise.resolve()
        .then(callback)
        .catch((error: unknown) => {
          this.logger.error(`Notify loop failed: ${String(error)}`);
        });
    }, delay);

    this.schedulerRegistry.addTimeout(NOTIFY_TIMEOUT_NAME, timeout);
  }

  private clearTimer(): void {
    if (this.schedulerRegistry.doesExist('timeout', NOTIFY_TIMEOUT_NAME)) {
      this.schedulerRegistry.deleteTimeout(NOTIFY_TIMEOUT_NAME);
    }
  }
}
