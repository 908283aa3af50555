import { Injectable } from '@nestjs/common';
import pc from 'picocolors';

export type Colors = ReturnType<typeof pc.createColors>;

/**
 * User-facing terminal output. Diagnostics go through the Nest logger instead.
 */
@Injectable()
export class TerminalService {
  private palette: Colors = pc.createColors(pc.isColorSupported);

  get colors(): Colors {
    return this.palette;
  }

  setColorEnabled(enabled: boolean): void {
    this.palette = pc.createColors(enabled && pc.isColorSupported);
  }

  /** True when stdout is a terminal we can redraw in place */
  get isInteractive(): boolean {
    return process.stdout.isTTY === true;
  }

  print(line = ''): void {
    process.stdout.write(`${line}\n`);
  }

  /** Raw write, for cursor control sequences */
  write(chunk: string): void {
    process.stdout.write(chunk);
  }

  error(message: string): void {
    process.stderr.write(`${this.palette.red(message)}\n`);
  }
}
