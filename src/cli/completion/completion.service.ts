import * as path from 'path';

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { CliUsageError } from '../../common/errors';
import { atomicWriteText } from '../../common/utils/atomic-write';
import { TerminalService } from '../../output/terminal.service';

export const SHELLS = ['bash', 'zsh', 'fish'] as const;

export type Shell = (typeof SHELLS)[number];

/**
 * What the completion scripts offer: the subcommands and the flags of each.
 */
export interface CompletionSpec {
  bin: string;
  rootOptions: string[];
  commands: { name: string; options: string[] }[];
}

const RC_FILES: Record<Shell, string> = {
  bash: '~/.bashrc',
  zsh: '~/.zshrc',
  fish: '~/.config/fish/config.fish',
};

/**
 * Shell completion scripts for bash, zsh and fish.
 */
@Injectable()
export class CompletionService {
  private readonly logger = new Logger(CompletionService.name);
  private readonly completionsDir: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly terminal: TerminalService,
  ) {
    this.completionsDir = this.configService.getOrThrow<string>('paths.completions');
  }

  /**
   * Shell named on the command line, else the login shell from $SHELL.
   */
  resolveShell(requested: string | boolean | undefined, envShell: string | undefined): Shell {
    const name = typeof requested === 'string' ? requested : path.basename(envShell ?? '');
    const normalized = name.trim().toLowerCase();

    if (!isShell(normalized)) {
      throw new CliUsageError(
        name
          ? `Unsupported shell "${name}". Use one of: ${SHELLS.join(', ')}.`
          : `Could not detect your shell. Pass one of: ${SHELLS.join(', ')}.`,
      );
    }
    return normalized;
  }

  render(shell: Shell, spec: CompletionSpec): string {
    switch (shell) {
      case 'bash':
        return renderBash(spec);
      case 'zsh':
        return `autoload -U +X bashcompinit && bashcompinit\n${renderBash(spec)}`;
      case 'fish':
        return renderFish(spec);
    }
  }

  show(shell: Shell, spec: CompletionSpec): void {
    this.terminal.write(this.render(shell, spec));
  }

  /**
   * Write the script under the completions directory and tell the user how to load it.
   */
  async install(shell: Shell, spec: CompletionSpec): Promise<string> {
    const filePath = path.join(this.completionsDir, `${spec.bin}.${shell}`);
    await atomicWriteText(filePath, this.render(shell, spec));
    this.logger.debug(`Wrote ${shell} completion to ${filePath}`);

    this.terminal.print(this.terminal.colors.green(`Installed ${shell} completion at ${filePath}`));
    this.terminal.print(`Add this line to ${RC_FILES[shell]}:`);
    this.terminal.print(`  source ${filePath}`);
    return filePath;
  }
}

function isShell(value: string): value is Shell {
  return (SHELLS as readonly string[]).includes(value);
}

function renderBash(spec: CompletionSpec): string {
  const fn = `_${spec.bin.replace(/[^A-Za-z0-9_]/g, '_')}_completion`;
  const cases = spec.commands
    .map((cmd) => `    ${cmd.name}) words="${cmd.options.join(' ')}" ;;`)
    .join('\n');
  const rootWords = [...spec.commands.map((cmd) => cmd.name), ...spec.rootOptions].join(' ');

  return [
    `${fn}() {`,
    '  local cur="${COMP_WORDS[COMP_CWORD]}"',
    '  local words',
    '  case "${COMP_WORDS[1]}" in',
    cases,
    `    *) words="${rootWords}" ;;`,
    '  esac',
    '  COMPREPLY=( $(compgen -W "$words" -- "$cur") )',
    '}',
    `complete -F ${fn} ${spec.bin}`,
    '',
  ].join('\n');
}

function renderFish(spec: CompletionSpec): string {
  const names = spec.commands.map((cmd) => cmd.name).join(' ');
  const lines = [`complete -c ${spec.bin} -f`];

  lines.push(`complete -c ${spec.bin} -n '__fish_use_subcommand' -a '${names}'`);
  for (const option of spec.rootOptions) {
    lines.push(`complete -c ${spec.bin} -n '__fish_use_subcommand' ${fishFlag(option)}`);
  }
  for (const cmd of spec.commands) {
    for (const option of cmd.options) {
      lines.push(`complete -c ${spec.bin} -n '__fish_seen_subcommand_from ${cmd.name}' ${fishFlag(option)}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

function fishFlag(option: string): string {
  return option.startsWith('--') ? `-l ${option.slice(2)}` : `-s ${option.slice(1)}`;
}
