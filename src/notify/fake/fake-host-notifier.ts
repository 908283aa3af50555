import { HostNotifier } from '../host-notifier';

export interface SentNotification {
  title: string;
  message: string;
}

/**
 * In-memory notifier for tests.
 */
export class FakeHostNotifier implements HostNotifier {
  readonly id = 'none' as const;
  readonly displayName = 'Fake notifier';

  public sent: SentNotification[] = [];
  /** What notify() reports back */
  public delivers = true;

  notify(title: string, message: string): Promise<boolean> {
    this.sent.push({ title, message });
    return Promise.resolve(this.delivers);
  }
}
