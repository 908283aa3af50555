import { execFile, execFileSync } from 'child_process';

import { Logger } from '@nestjs/common';

import { NotifierPreference } from '../config/configuration';

export type NotifierId = 'macos' | 'linux' | 'none';

/**
 * Desktop notification backend. `notify` resolves false when nothing was shown,
 * so callers can fall back to printing.
 */
export interface HostNotifier {
  id: NotifierId;
  displayName: string;
  notify(title: string, message: string): Promise<boolean>;
}

const logger = new Logger('HostNotifier');

function commandExists(command: string): boolean {
  try {
    execFileSync('which', [command], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

function escapeAppleScriptString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function run(command: string, args: string[]): Promise<boolean> {
  return new Promise((resolve) => {
    execFile(command, args, (err) => {
      if (err) {
        logger.debug(`${command} failed: ${err.message}`);
        resolve(false);
        return;
      }
      resolve(true);
    });
  });
}

const macNotifier: HostNotifier = {
  id: 'macos',
  displayName: 'macOS notifications',
  notify(title, message) {
    const script = `display notification "${escapeAppleScriptString(message)}" with title "${escapeAppleScriptString(title)}" sound name "Glass"`;
    return run('osascript', ['-e', script]);
  },
};

const linuxNotifier: HostNotifier = {
  id: 'linux',
  displayName: 'Linux desktop notifications',
  notify(title, message) {
    return run('notify-send', ['--app-name=miqat', title, message]);
  },
};

const noopNotifier: HostNotifier = {
  id: 'none',
  displayName: 'No desktop notifications',
  notify(title, message) {
    logger.debug(`Desktop notifications disabled: ${title} - ${message}`);
    return Promise.resolve(false);
  },
};

/**
 * Pick a backend from the configured preference, detecting one on `auto`.
 */
export function resolveNotifierId(
  preference: NotifierPreference,
  platform: NodeJS.Platform = process.platform,
  hasCommand: (command: string) => boolean = commandExists,
): NotifierId {
  if (preference !== 'auto') return preference;

  if (platform === 'darwin' && hasCommand('osascript')) return 'macos';
  if (platform === 'linux' && hasCommand('notify-send')) return 'linux';
  return 'none';
}

export function createHostNotifier(preference: NotifierPreference): HostNotifier {
  const id = resolveNotifierId(preference);
  const notifier = id === 'macos' ? macNotifier : id === 'linux' ? linuxNotifier : noopNotifier;
  logger.debug(`Host notifier selected: ${notifier.displayName}`);
  return notifier;
}
