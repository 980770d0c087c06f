import type { PromptChoice, PromptPort } from './prompt.js';

/** Raised when a conflict needs an answer and nobody is there to give one. */
export class NonInteractivePromptError extends Error {
  constructor(promptType: string) {
    super(
      `Cannot prompt for ${promptType} in non-interactive mode. ` +
      `Use --overwrite or --skip-existing to answer conflicts up front.`
    );
    this.name = 'NonInteractivePromptError';
  }
}

export const nonInteractivePrompt: PromptPort = {
  async confirm(_message: string, _initial?: boolean): Promise<boolean> {
    throw new NonInteractivePromptError('confirmation');
  },

  async select<T>(_message: string, _choices: Array<PromptChoice<T>>, _hint?: string): Promise<T> {
    throw new NonInteractivePromptError('selection');
  }
};
