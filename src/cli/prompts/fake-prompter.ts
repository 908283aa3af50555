import { IPrompter, SelectChoice, TextPromptOptions } from './prompter.interface';

/**
 * Scripted prompter for tests: answers are consumed in order.
 */
export class FakePrompter implements IPrompter {
  public asked: string[] = [];
  public offered: string[][] = [];

  constructor(private readonly answers: string[]) {}

  intro(): void {}

  outro(): void {}

  async select<T extends string>(message: string, choices: SelectChoice<T>[]): Promise<T> {
    this.asked.push(message);
    this.offered.push(choices.map((choice) => choice.value));

    const answer = this.next(message);
    const picked = choices.find((choice) => choice.value === answer);
    if (!picked) {
      throw new Error(`"${answer}" is not a choice for "${message}"`);
    }
    return picked.value;
  }

  async text(message: string, options: TextPromptOptions = {}): Promise<string> {
    this.asked.push(message);

    const answer = this.next(message);
    const problem = options.validate?.(answer);
    if (problem) {
      throw new Error(`"${answer}" rejected for "${message}": ${problem}`);
    }
    return answer;
  }

  private next(message: string): string {
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`No scripted answer for "${message}"`);
    }
    return answer;
  }
}
