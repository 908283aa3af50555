import { Test, TestingModule } from '@nestjs/testing';

import { PrayerApiError, SettingsNotFoundError } from '../../common/errors';
import { FakeTerminalService } from '../../output/fake/fake-terminal.service';
import { PresenterService } from '../../output/presenter.service';
import { TerminalService } from '../../output/terminal.service';
import { PrayerBundle } from '../../prayer-api/prayer-api.types';
import { PrayerApiService } from '../../prayer-api/prayer-api.service';
import { PrayerTimeService } from '../../prayer-time/prayer-time.service';
import { Settings } from '../../settings/settings.schema';
import { SettingsService } from '../../settings/settings.service';

import { TodayCommand } from './today.command';

describe('TodayCommand', () => {
  let command: TodayCommand;
  let terminal: FakeTerminalService;
  let load: jest.Mock;
  let fetchBundle: jest.Mock;

  const settings: Settings = {
    location: {
      city: 'Mecca',
      country: 'Saudi Arabia',
      countryCode: 'SA',
      lat: 21.3891,
      lon: 39.8579,
    },
    prayerSource: 'diyanet',
    timeFormat: '12h',
  };

  const bundle: PrayerBundle = {
    times: {
      Fajr: '04:10',
      Sunrise: '05:55',
      Dhuhr: '12:55',
      Asr: '16:32',
      Maghrib: '19:58',
      Isha: '21:29',
    },
    tomorrowFajr: '04:10',
    timeZone: 'Asia/Riyadh',
    requestedSource: 'diyanet',
    resolvedSource: 'mwl',
    fromCache: false,
  };

  // 14:00 in Mecca
  const now = new Date('2026-06-15T11:00:00Z');

  beforeEach(async () => {
    terminal = new FakeTerminalService();
    load = jest.fn().mockResolvedValue(settings);
    fetchBundle = jest.fn().mockResolvedValue(bundle);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TodayCommand,
        PresenterService,
        PrayerTimeService,
        { provide: TerminalService, useValue: terminal },
        { provide: SettingsService, useValue: { load } },
        { provide: PrayerApiService, useValue: { fetchBundle } },
      ],
    }).compile();

    command = module.get<TodayCommand>(TodayCommand);
  });

  it("should print today's table from the fetched times", async () => {
    await command.run(now);

    expect(fetchBundle).toHaveBeenCalledWith(settings.location, 'diyanet', now);
    expect(terminal.lines).toEqual([
      'Mecca, Saudi Arabia',
      'Source: Muslim World League (AlAdhan) | Timezone: Asia/Riyadh | Now: 14:00:00',
      'Diyanet is only available in Turkey',
      '',
      'Prayer                Time',
      '--------------------------',
      'Fajr               4:10 AM',
      'Sunrise            5:55 AM',
      'Dhuhr             12:55 PM',
      'Asr                4:32 PM',
      'Maghrib            7:58 PM',
      'Isha               9:29 PM',
    ]);
  });

  it('should print cached times with a note', async () => {
    fetchBundle.mockResolvedValue({ ...bundle, fromCache: true });

    await command.run(now);

    expect(terminal.lines[3]).toBe('Offline: showing cached prayer times for today');
    expect(terminal.lines[7]).toBe('Fajr               4:10 AM');
  });

  it('should print nothing when the fetch fails without a cache', async () => {
    fetchBundle.mockRejectedValue(
      new PrayerApiError('Failed to fetch prayer times: offline. No cached prayer times for today.'),
    );

    await expect(command.run(now)).rejects.toBeInstanceOf(PrayerApiError);
    expect(terminal.lines).toEqual([]);
  });

  it('should not fetch without settings', async () => {
    load.mockRejectedValue(new SettingsNotFoundError('/tmp/miqat/config.json'));

    await expect(command.run(now)).rejects.toThrow(
      'No configuration found at /tmp/miqat/config.json. Run "miqat config" to set your location.',
    );
    expect(fetchBundle).not.toHaveBeenCalled();
  });
});
