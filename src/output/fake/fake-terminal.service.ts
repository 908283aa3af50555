import pc from 'picocolors';

import { Colors, TerminalService } from '../terminal.service';

/**
 * Terminal for tests: captures everything written. Colours are off
 * unless asked for, so assertions can compare plain text.
 */
export class FakeTerminalService extends TerminalService {
  public lines: string[] = [];
  public errors: string[] = [];
  public raw: string[] = [];
  public interactive = false;

  private readonly fakePalette: Colors;

  constructor(colorize = false) {
    super();
    this.fakePalette = pc.createColors(colorize);
  }

  override get colors(): Colors {
    return this.fakePalette;
  }

  override setColorEnabled(): void {}

  override get isInteractive(): boolean {
    return this.interactive;
  }

  override print(line = ''): void {
    this.lines.push(line);
  }

  override write(chunk: string): void {
    this.raw.push(chunk);
  }

  override error(message: string): void {
    this.errors.push(message);
  }

  /** Everything printed so far, one string */
  get output(): string {
    return this.lines.join('\n');
  }

  reset(): void {
    this.lines = [];
    this.errors = [];
    this.raw = [];
  }
}
