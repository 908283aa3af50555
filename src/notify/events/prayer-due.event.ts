import { PrayerName } from '../../common/types/prayer';

/**
 * Emitted by the notify daemon when a prayer time arrives.
 */
export class PrayerDueEvent {
  constructor(
    public readonly prayer: PrayerName,
    /** Time as the user prefers to read it */
    public readonly displayTime: string,
  ) {}
}
