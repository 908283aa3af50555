import { cancel, select, text } from '@clack/prompts';

import { ClackPrompter, PromptCancelledError } from './clack-prompter';

const CANCELLED = Symbol.for('miqat:prompt-cancel');

jest.mock('@clack/prompts', () => ({
  cancel: jest.fn(),
  intro: jest.fn(),
  outro: jest.fn(),
  select: jest.fn(),
  text: jest.fn(),
  isCancel: (value: unknown) => value === Symbol.for('miqat:prompt-cancel'),
}));

describe('ClackPrompter', () => {
  const prompter = new ClackPrompter();
  const selectMock = jest.mocked(select);
  const textMock = jest.mocked(text);

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('select', () => {
    it('should offer the choices and return the picked value', async () => {
      selectMock.mockResolvedValue('mwl');

      const picked = await prompter.select(
        'Calculation method',
        [
          { value: 'diyanet', label: 'Diyanet', hint: 'Turkey only' },
          { value: 'mwl', label: 'Muslim World League' },
        ],
        'diyanet',
      );

      expect(picked).toBe('mwl');
      expect(selectMock).toHaveBeenCalledWith({
        message: 'Calculation method',
        options: [
          { value: 'diyanet', label: 'Diyanet', hint: 'Turkey only' },
          { value: 'mwl', label: 'Muslim World League', hint: undefined },
        ],
        initialValue: 'diyanet',
      });
    });

    it('should throw when the prompt is cancelled', async () => {
      selectMock.mockResolvedValue(CANCELLED);

      await expect(prompter.select('Time format', [{ value: '24h', label: '24-hour' }])).rejects.toThrow(
        PromptCancelledError,
      );
      expect(cancel).toHaveBeenCalledWith('Setup cancelled.');
    });
  });

  describe('text', () => {
    it('should return the trimmed answer', async () => {
      textMock.mockResolvedValue('  Konya  ');

      await expect(prompter.text('City')).resolves.toBe('Konya');
    });

    it('should throw when the prompt is cancelled', async () => {
      textMock.mockResolvedValue(CANCELLED);

      await expect(prompter.text('City')).rejects.toThrow('Setup cancelled.');
    });
  });
});
