import { cancel, intro, isCancel, outro, select, text } from '@clack/prompts';
import { Injectable } from '@nestjs/common';

import { MiqatError } from '../../common/errors';

import { IPrompter, SelectChoice, TextPromptOptions } from './prompter.interface';

export class PromptCancelledError extends MiqatError {
  constructor() {
    super('Setup cancelled.');
  }
}

@Injectable()
export class ClackPrompter implements IPrompter {
  intro(title: string): void {
    intro(title);
  }

  outro(message: string): void {
    outro(message);
  }

  async select<T extends string>(
    message: string,
    choices: SelectChoice<T>[],
    initialValue?: T,
  ): Promise<T> {
    const options: { value: string; label: string; hint?: string }[] = choices.map((choice) => ({
      value: choice.value,
      label: choice.label,
      hint: choice.hint,
    }));
    const initial: string | undefined = initialValue;
    const answer = await select({ message, options, initialValue: initial });

    const picked = isCancel(answer) ? undefined : choices.find((choice) => choice.value === answer);
    if (!picked) {
      cancel('Setup cancelled.');
      throw new PromptCancelledError();
    }
    return picked.value;
  }

  async text(message: string, options: TextPromptOptions = {}): Promise<string> {
    const answer = await text({
      message,
      placeholder: options.placeholder,
      initialValue: options.initialValue,
      validate: options.validate,
    });

    if (isCancel(answer)) {
      cancel('Setup cancelled.');
      throw new PromptCancelledError();
    }
    return answer.trim();
  }
}
