import { Injectable } from '@nestjs/common';

import { NotifyService } from '../../notify/notify.service';
import { TerminalService } from '../../output/terminal.service';
import { SettingsService } from '../../settings/settings.service';
import { waitForShutdownSignal } from '../shutdown';

/**
 * `miqat notify`: runs the notification daemon until interrupted.
 */
@Injectable()
export class NotifyCommand {
  constructor(
    private readonly settings: SettingsService,
    private readonly notifyService: NotifyService,
    private readonly terminal: TerminalService,
  ) {}

  async run(stopSignal: Promise<unknown> = waitForShutdownSignal()): Promise<void> {
    const settings = await this.settings.load();

    this.terminal.print(
      `Prayer notifications for ${settings.location.city}, ${settings.location.country}. Press Ctrl+C to stop.`,
    );
    await this.notifyService.start(settings);

    await stopSignal;
    this.notifyService.stop();
    this.terminal.print('Notifications stopped.');
  }
}
