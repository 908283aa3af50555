/**
 * Injection token for the interactive prompter
 */
export const PROMPTER = Symbol('PROMPTER');
