import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';

import { PrayerApiError } from '../common/errors';
import { HTTP_CLIENT } from '../http/http.constants';
import { PrayerTimeService } from '../prayer-time/prayer-time.service';

import { DiyanetClient } from './diyanet.client';

describe('DiyanetClient', () => {
  let client: DiyanetClient;
  let get: jest.Mock;

  const now = new Date('2026-06-15T09:00:00Z');

  const day = (date: string, imsak: string) => ({
    MiladiTarihKisa: date,
    Imsak: imsak,
    Gunes: '05:33',
    Ogle: '13:10',
    Ikindi: '17:08',
    Aksam: '20:37',
    Yatsi: '22:10',
  });

  const feed = [day('14.06.2026', '03:22'), day('15.06.2026', '03:21'), day('16.06.2026', '03:20')];

  beforeEach(async () => {
    get = jest.fn();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DiyanetClient,
        PrayerTimeService,
        { provide: HTTP_CLIENT, useValue: { get } },
        {
          provide: ConfigService,
          useValue: { getOrThrow: jest.fn(() => 'https://diyanet.test/vakitler') },
        },
      ],
    }).compile();

    client = module.get<DiyanetClient>(DiyanetClient);
  });

  it('should request the district and map the Turkish field names', async () => {
    get.mockResolvedValue({ data: JSON.stringify(feed) });

    const result = await client.fetchTimes('9541', now);

    expect(get).toHaveBeenCalledWith('https://diyanet.test/vakitler/9541', { responseType: 'text' });
    expect(result).toEqual({
      times: {
        Fajr: '03:21',
        Sunrise: '05:33',
        Dhuhr: '13:10',
        Asr: '17:08',
        Maghrib: '20:37',
        Isha: '22:10',
      },
      tomorrowFajr: '03:20',
      timeZone: 'Europe/Istanbul',
    });
  });

  it('should strip a leading byte order mark', async () => {
    get.mockResolvedValue({ data: `\uFEFF${JSON.stringify(feed)}` });

    const result = await client.fetchTimes('9541', now);

    expect(result.times.Fajr).toBe('03:21');
  });

  it('should pick the day by Turkish date, not UTC', async () => {
    get.mockResolvedValue({ data: JSON.stringify(feed) });

    // 22:30 UTC on the 14th is already the 15th in Istanbul
    const result = await client.fetchTimes('9541', new Date('2026-06-14T22:30:00Z'));

    expect(result.times.Fajr).toBe('03:21');
    expect(result.tomorrowFajr).toBe('03:20');
  });

  it('should wrap network failures', async () => {
    get.mockRejectedValue(new Error('connect ECONNREFUSED'));

    await expect(client.fetchTimes('9541', now)).rejects.toThrow(
      'Failed to fetch prayer times from Diyanet: connect ECONNREFUSED',
    );
  });

  it('should reject a body that is not JSON', async () => {
    get.mockResolvedValue({ data: '<html>maintenance</html>' });

    await expect(client.fetchTimes('9541', now)).rejects.toThrow('Invalid response from Diyanet');
  });

  it('should reject JSON that is not a list of days', async () => {
    get.mockResolvedValue({ data: '{"error":"unknown district"}' });

    await expect(client.fetchTimes('9541', now)).rejects.toThrow('Unexpected Diyanet response');
  });

  it("should fail when today's entry is missing", async () => {
    get.mockResolvedValue({ data: JSON.stringify([day('16.06.2026', '03:20')]) });

    await expect(client.fetchTimes('9541', now)).rejects.toThrow("Could not find today's prayer times");
  });

  it("should fail when tomorrow's entry is missing", async () => {
    get.mockResolvedValue({ data: JSON.stringify([day('15.06.2026', '03:21')]) });

    await expect(client.fetchTimes('9541', now)).rejects.toThrow("Could not find tomorrow's prayer times");
  });

  it('should reject a malformed time field', async () => {
    const broken = [day('15.06.2026', 'soon'), day('16.06.2026', '03:20')];
    get.mockResolvedValue({ data: JSON.stringify(broken) });

    const error: unknown = await client.fetchTimes('9541', now).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PrayerApiError);
    expect(error).toHaveProperty('message', 'Invalid time format for Imsak: "soon"');
  });
});
