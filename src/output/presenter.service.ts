import { Injectable } from '@nestjs/common';
import { format } from 'date-fns';

import { PRAYER_NAMES, PrayerName, SOURCE_LABELS, TimeFormat } from '../common/types/prayer';
import { Location } from '../location/location.schema';
import { PrayerBundle } from '../prayer-api/prayer-api.types';
import { CurrentPrayerInfo, PrayerTimeService } from '../prayer-time/prayer-time.service';

import { Colors, TerminalService } from './terminal.service';

const NAME_WIDTH = 18;
const TIME_WIDTH = 8;

type RowStyle = 'next' | 'passed' | 'upcoming';

/**
 * Turns prayer data into the lines the CLI prints.
 * Rendering returns lines so commands decide where and how often they go out.
 */
@Injectable()
export class PresenterService {
  constructor(
    private readonly prayerTime: PrayerTimeService,
    private readonly terminal: TerminalService,
  ) {}

  private get c(): Colors {
    return this.terminal.colors;
  }

  /**
   * Today's table: a title, the source line, then one row per prayer with passed
   * prayers dimmed and the next one highlighted.
   */
  renderToday(
    location: Location,
    bundle: PrayerBundle,
    info: CurrentPrayerInfo,
    timeFormat: TimeFormat,
    now: Date = new Date(),
  ): string[] {
    const zonedNow = this.prayerTime.getZonedNow(bundle.timeZone, now);
    const zoneLabel = bundle.timeZone ?? 'local';

    const lines = [
      this.c.bold(`${location.city}, ${location.country}`),
      this.c.dim(
        `Source: ${SOURCE_LABELS[bundle.resolvedSource]} | Timezone: ${zoneLabel} | Now: ${format(zonedNow, 'HH:mm:ss')}`,
      ),
    ];

    if (bundle.resolvedSource !== bundle.requestedSource) {
      lines.push(this.c.dim(`${SOURCE_LABELS[bundle.requestedSource]} is only available in Turkey`));
    }
    if (bundle.fromCache) {
      lines.push(this.c.yellow('Offline: showing cached prayer times for today'));
    }

    lines.push('');
    lines.push(this.c.bold(`${'Prayer'.padEnd(NAME_WIDTH)}${'Time'.padStart(TIME_WIDTH)}`));
    lines.push('-'.repeat(NAME_WIDTH + TIME_WIDTH));

    for (const name of PRAYER_NAMES) {
      const isTomorrowFajr = info.isAfterIsha && name === 'Fajr';
      const label = isTomorrowFajr ? 'Fajr (tomorrow)' : name;
      const time = isTomorrowFajr ? info.nextPrayerTime : bundle.times[name];
      const display = this.prayerTime.formatTimeForDisplay(time, timeFormat);
      const row = `${label.padEnd(NAME_WIDTH)}${display.padStart(TIME_WIDTH)}`;

      lines.push(this.styleRow(row, this.rowStyle(name, bundle.times[name], info, zonedNow)));
    }

    return lines;
  }

  /**
   * Panel for `miqat next`.
   */
  renderNext(
    location: Location,
    bundle: PrayerBundle,
    info: CurrentPrayerInfo,
    timeFormat: TimeFormat,
  ): string[] {
    const lines = [
      `Location:    ${location.city}, ${location.country}`,
      `Source:      ${SOURCE_LABELS[bundle.resolvedSource]}`,
      `Next prayer: ${this.c.bold(info.nextPrayer)}`,
      `At:          ${this.prayerTime.formatTimeForDisplay(info.nextPrayerTime, timeFormat)}`,
      `Countdown:   ${this.c.green(this.prayerTime.formatCountdown(info.msUntilNext))}`,
    ];

    if (bundle.fromCache) {
      lines.push(this.c.yellow('Offline: showing cached prayer times for today'));
    }
    return lines;
  }

  private rowStyle(
    name: PrayerName,
    time: string,
    info: CurrentPrayerInfo,
    zonedNow: Date,
  ): RowStyle {
    if (name === info.nextPrayer) return 'next';
    // after Isha every row of today has passed except the rolled-over Fajr
    if (this.prayerTime.timeOnDate(time, zonedNow).getTime() <= zonedNow.getTime()) {
      return 'passed';
    }
    return 'upcoming';
  }

  private styleRow(row: string, style: RowStyle): string {
    switch (style) {
      case 'next':
        return this.c.bold(this.c.green(row));
      case 'passed':
        return this.c.dim(row);
      default:
        return row;
    }
  }
}
