export interface SelectChoice<T extends string> {
  value: T;
  label: string;
  hint?: string;
}

export interface TextPromptOptions {
  placeholder?: string;
  initialValue?: string;
  /** Return an error message to reject the value */
  validate?: (value: string) => string | undefined;
}

/**
 * Interactive prompts used by `miqat config`.
 * Implementations throw PromptCancelledError when the user aborts.
 */
export interface IPrompter {
  intro(title: string): void;
  outro(message: string): void;
  select<T extends string>(message: string, choices: SelectChoice<T>[], initialValue?: T): Promise<T>;
  text(message: string, options?: TextPromptOptions): Promise<string>;
}
