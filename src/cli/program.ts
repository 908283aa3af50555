import { INestApplicationContext, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Command } from 'commander';

import { AppModule } from '../app.module';
import { validateEnv } from '../config/configuration';
import { TerminalService } from '../output/terminal.service';
import { APP_NAME, APP_VERSION } from '../version';

import { ConfigCommand, ConfigOptions } from './commands/config.command';
import { NextCommand, NextOptions } from './commands/next.command';
import { NotifyCommand } from './commands/notify.command';
import { TodayCommand } from './commands/today.command';
import { CompletionService, CompletionSpec } from './completion/completion.service';

export interface GlobalOptions {
  verbose?: boolean;
  color: boolean;
  showCompletion?: string | boolean;
  installCompletion?: string | boolean;
}

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Nest log levels up to and including the chosen one. `--verbose` turns on all of them.
 */
export function resolveLogLevels(verbose: boolean, configured: LogLevel): LogLevel[] {
  const threshold = verbose ? 'verbose' : configured;
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(threshold) + 1);
}

async function withApp(
  globals: GlobalOptions,
  run: (app: INestApplicationContext) => Promise<void>,
): Promise<void> {
  const env = validateEnv();
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: resolveLogLevels(globals.verbose === true, env.LOG_LEVEL),
    abortOnError: false,
  });
  app.get(TerminalService).setColorEnabled(globals.color);

  try {
    await run(app);
  } finally {
    await app.close();
  }
}

/**
 * Subcommands and flags, as offered by the completion scripts.
 */
export function describeProgram(program: Command): CompletionSpec {
  const flags = (command: Command) =>
    command.options.flatMap((option) => (option.long ? [option.long] : [])).concat('--help');

  return {
    bin: program.name(),
    rootOptions: flags(program),
    commands: program.commands.map((command) => ({ name: command.name(), options: flags(command) })),
  };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description("Today's prayer times, a countdown to the next one, and desktop reminders")
    .version(`${APP_NAME} ${APP_VERSION}`, '-V, --version', 'Show the version and exit')
    .option('--verbose', 'Show diagnostic logs')
    .option('--no-color', 'Disable coloured output')
    .option('--show-completion [shell]', 'Print the completion script for bash, zsh or fish')
    .option('--install-completion [shell]', 'Install the completion script for bash, zsh or fish')
    .action(async (_options: unknown, command: Command) => {
      const globals = command.opts<GlobalOptions>();

      await withApp(globals, async (app) => {
        const completion = app.get(CompletionService);
        const loginShell = process.env.SHELL;
        if (globals.showCompletion) {
          completion.show(completion.resolveShell(globals.showCompletion, loginShell), describeProgram(program));
          return;
        }
        if (globals.installCompletion) {
          await completion.install(
            completion.resolveShell(globals.installCompletion, loginShell),
            describeProgram(program),
          );
          return;
        }
        await app.get(TodayCommand).run();
      });
    });

  program
    .command('next')
    .description('Count down to the next prayer')
    .option('--once', 'Print the countdown once and exit')
    .action(async (_options: unknown, command: Command) => {
      const options = command.optsWithGlobals<GlobalOptions & NextOptions>();
      await withApp(options, (app) => app.get(NextCommand).run({ once: options.once }));
    });

  program
    .command('config')
    .description('Show or change location, calculation method and time format')
    .option('--show', 'Print the current configuration')
    .option('--city <city>', 'City name')
    .option('--country <country>', 'Country name')
    .option('--country-code <code>', 'ISO country code, e.g. TR')
    .option('--lat <latitude>', 'Latitude in degrees')
    .option('--lon <longitude>', 'Longitude in degrees')
    .option('--address-label <label>', 'Free-form label for the location')
    .option('--diyanet-ilce-id <id>', 'Diyanet district id')
    .option('--method <method>', 'Calculation method: diyanet or mwl')
    .option('--time-format <format>', 'Time format: 12h or 24h')
    .option('--auto-location', 'Detect the location from your IP address')
    .option('--search <query>', 'Search for a place by name')
    .option('--search-index <n>', 'Which search result to use, starting at 1')
    .action(async (_options: unknown, command: Command) => {
      const options = command.optsWithGlobals<GlobalOptions & ConfigOptions>();
      await withApp(options, (app) => app.get(ConfigCommand).run(options));
    });

  program
    .command('notify')
    .description('Send a desktop notification at each prayer time')
    .action(async (_options: unknown, command: Command) => {
      await withApp(command.optsWithGlobals<GlobalOptions>(), (app) => app.get(NotifyCommand).run());
    });

  return program;
}
