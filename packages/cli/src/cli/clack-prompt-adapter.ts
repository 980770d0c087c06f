import * as clack from '@clack/prompts';
import type { PromptChoice, PromptPort } from '@forkferry/core/core/ports/prompt.js';
import { UserCancellationError } from '@forkferry/core/utils/errors.js';

/** Ctrl-C at a conflict question stops the whole transfer. */
function abortTransfer(): never {
  clack.cancel('Transfer cancelled.');
  throw new UserCancellationError('Transfer cancelled at prompt');
}

export function createClackPrompt(): PromptPort {
  return {
    async confirm(message: string, initial?: boolean): Promise<boolean> {
      const answer = await clack.confirm({ message, initialValue: initial ?? false });
      if (clack.isCancel(answer)) {
        abortTransfer();
      }
      return answer;
    },

    async select<T>(message: string, choices: Array<PromptChoice<T>>, hint?: string): Promise<T> {
      // Options carry their index; clack compares values by identity
      const answer = await clack.select<string>({
        message: hint ? `${message} ${hint}` : message,
        options: choices.map((choice, index) => ({
          value: String(index),
          label: choice.title,
          hint: choice.description
        }))
      });
      if (clack.isCancel(answer)) {
        abortTransfer();
      }
      const choice = choices[Number(answer)];
      if (!choice) {
        abortTransfer();
      }
      return choice.value;
    }
  };
}
