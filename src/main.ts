#!/usr/bin/env node
import 'reflect-metadata';

import pc from 'picocolors';

import { createProgram } from './cli/program';
import { MiqatError } from './common/errors';

async function bootstrap(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

bootstrap().catch((error: unknown) => {
  const message =
    error instanceof MiqatError
      ? error.message
      : `Unexpected error: ${error instanceof Error ? error.message : String(error)}`;

  process.stderr.write(`${pc.red(message)}\n`);
  process.exitCode = 1;
});
