import { createProgram, describeProgram, resolveLogLevels } from './program';

describe('program', () => {
  describe('describeProgram', () => {
    it('should list the subcommands and their flags', () => {
      const spec = describeProgram(createProgram());

      expect(spec.bin).toBe('miqat');
      expect(spec.commands.map((command) => command.name)).toEqual(['next', 'config', 'notify']);
      expect(spec.commands[0].options).toEqual(['--once', '--help']);
      expect(spec.commands[1].options).toContain('--search-index');
      expect(spec.rootOptions).toEqual([
        '--version',
        '--verbose',
        '--no-color',
        '--show-completion',
        '--install-completion',
        '--help',
      ]);
    });
  });

  describe('resolveLogLevels', () => {
    it('should keep the configured level', () => {
      expect(resolveLogLevels(false, 'warn')).toEqual(['error', 'warn']);
    });

    it('should enable every level with --verbose', () => {
      expect(resolveLogLevels(true, 'warn')).toEqual(['error', 'warn', 'log', 'debug', 'verbose']);
    });

    it('should honour a more verbose configured level', () => {
      expect(resolveLogLevels(false, 'debug')).toEqual(['error', 'warn', 'log', 'debug']);
    });
  });
});
