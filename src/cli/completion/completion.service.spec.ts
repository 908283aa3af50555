import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';

import { CliUsageError } from '../../common/errors';
import { FakeTerminalService } from '../../output/fake/fake-terminal.service';
import { TerminalService } from '../../output/terminal.service';

import { CompletionService, CompletionSpec } from './completion.service';

describe('CompletionService', () => {
  let service: CompletionService;
  let terminal: FakeTerminalService;
  let tempDir: string;

  const spec: CompletionSpec = {
    bin: 'miqat',
    rootOptions: ['--verbose', '--help'],
    commands: [{ name: 'next', options: ['--once', '--help'] }],
  };

  const bashScript = [
    '_miqat_completion() {',
    '  local cur="${COMP_WORDS[COMP_CWORD]}"',
    '  local words',
    '  case "${COMP_WORDS[1]}" in',
    '    next) words="--once --help" ;;',
    '    *) words="next --verbose --help" ;;',
    '  esac',
    '  COMPREPLY=( $(compgen -W "$words" -- "$cur") )',
    '}',
    'complete -F _miqat_completion miqat',
    '',
  ].join('\n');

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'miqat-completion-'));
    terminal = new FakeTerminalService();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CompletionService,
        { provide: ConfigService, useValue: { getOrThrow: jest.fn(() => tempDir) } },
        { provide: TerminalService, useValue: terminal },
      ],
    }).compile();

    service = module.get<CompletionService>(CompletionService);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('resolveShell', () => {
    it('should prefer the shell given on the command line', () => {
      expect(service.resolveShell('ZSH', '/bin/bash')).toBe('zsh');
    });

    it('should detect the shell from $SHELL', () => {
      expect(service.resolveShell(true, '/usr/local/bin/fish')).toBe('fish');
    });

    it('should reject unsupported shells', () => {
      expect(() => service.resolveShell('powershell', '/bin/bash')).toThrow(
        'Unsupported shell "powershell". Use one of: bash, zsh, fish.',
      );
      expect(() => service.resolveShell(true, undefined)).toThrow(CliUsageError);
    });
  });

  describe('render', () => {
    it('should render a bash script', () => {
      expect(service.render('bash', spec)).toBe(bashScript);
    });

    it('should load bash completion support for zsh', () => {
      expect(service.render('zsh', spec)).toBe(`autoload -U +X bashcompinit && bashcompinit\n${bashScript}`);
    });

    it('should render a fish script', () => {
      expect(service.render('fish', spec)).toBe(
        [
          'complete -c miqat -f',
          "complete -c miqat -n '__fish_use_subcommand' -a 'next'",
          "complete -c miqat -n '__fish_use_subcommand' -l verbose",
          "complete -c miqat -n '__fish_use_subcommand' -l help",
          "complete -c miqat -n '__fish_seen_subcommand_from next' -l once",
          "complete -c miqat -n '__fish_seen_subcommand_from next' -l help",
          '',
        ].join('\n'),
      );
    });
  });

  it('should print the script on show', () => {
    service.show('bash', spec);

    expect(terminal.raw).toEqual([bashScript]);
  });

  it('should write the script and explain how to load it', async () => {
    const filePath = await service.install('bash', spec);

    expect(filePath).toBe(path.join(tempDir, 'miqat.bash'));
    await expect(fs.readFile(filePath, 'utf-8')).resolves.toBe(bashScript);
    expect(terminal.lines).toEqual([
      `Installed bash completion at ${filePath}`,
      'Add this line to ~/.bashrc:',
      `  source ${filePath}`,
    ]);
  });
});
