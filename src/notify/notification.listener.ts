import { Inject, Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';

import { TerminalService } from '../output/terminal.service';

import { PrayerDueEvent } from './events/prayer-due.event';
import { HostNotifier } from './host-notifier';
import { HOST_NOTIFIER, NOTIFICATION_TITLE, NOTIFY_EVENTS } from './notify.constants';

/**
 * Shows a desktop notification when a prayer is due, or prints it
 * when no notifier delivered it.
 */
@Injectable()
export class NotificationListener {
  private readonly logger = new Logger(NotificationListener.name);

  constructor(
    @Inject(HOST_NOTIFIER) private readonly notifier: HostNotifier,
    private readonly terminal: TerminalService,
  ) {}

  @OnEvent(NOTIFY_EVENTS.PRAYER_DUE)
  async handlePrayerDue(event: PrayerDueEvent): Promise<void> {
    const message = `It's time for ${event.prayer} (${event.displayTime})`;

    let delivered = false;
    try {
      delivered = await this.notifier.notify(NOTIFICATION_TITLE, message);
    } catch (error) {
      this.logger.warn(`${this.notifier.displayName} failed: ${String(error)}`);
    }

    if (delivered) {
      this.logger.log(`Notification sent: ${message}`);
      return;
    }
    this.terminal.print(this.terminal.colors.bold(this.terminal.colors.green(message)));
  }
}
