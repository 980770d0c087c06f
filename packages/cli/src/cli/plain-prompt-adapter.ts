import { createInterface, type Interface } from 'node:readline';
import type { PromptChoice, PromptPort } from '@forkferry/core/core/ports/prompt.js';
import { UserCancellationError } from '@forkferry/core/utils/errors.js';

/**
 * Readline prompts for `--plain` on a terminal. Questions go to stderr so a
 * piped record listing on stdout is untouched.
 */
function openReadline(): Interface {
  return createInterface({ input: process.stdin, output: process.stderr, terminal: true });
}

function question(rl: Interface, query: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const onClose = (): void => reject(new UserCancellationError('Prompt cancelled'));
    rl.once('close', onClose);
    rl.once('SIGINT', () => rl.close());
    rl.question(query, answer => {
      rl.off('close', onClose);
      resolve(answer);
    });
  });
}

/** Picks a choice by number, by exact title, or by a title prefix only one choice has. */
export function matchChoice<T>(choices: ReadonlyArray<PromptChoice<T>>, answer: string): PromptChoice<T> | undefined {
  const trimmed = answer.trim().toLowerCase();
  if (trimmed === '') {
    return undefined;
  }
  if (/^\d+$/.test(trimmed)) {
    return choices[Number(trimmed) - 1];
  }
  const exact = choices.find(choice => choice.title.toLowerCase() === trimmed);
  if (exact) {
    return exact;
  }
  const byPrefix = choices.filter(choice => choice.title.toLowerCase().startsWith(trimmed));
  return byPrefix.length === 1 ? byPrefix[0] : undefined;
}

export function createPlainPrompt(): PromptPort {
  return {
    async confirm(message: string, initial?: boolean): Promise<boolean> {
      const rl = openReadline();
      try {
        const answer = (await question(rl, `${message} ${initial ? '[Y/n]' : '[y/N]'}: `)).trim().toLowerCase();
        return answer === '' ? initial ?? false : answer === 'y' || answer === 'yes';
      } finally {
        rl.close();
      }
    },

    async select<T>(message: string, choices: Array<PromptChoice<T>>, hint?: string): Promise<T> {
      const rl = openReadline();
      try {
        console.error(hint ? `${message} (${hint})` : message);
        choices.forEach((choice, i) => {
          console.error(`  ${i + 1}. ${choice.title}${choice.description ? ` - ${choice.description}` : ''}`);
        });
        for (;;) {
          const picked = matchChoice(choices, await question(rl, 'Choice: '));
          if (picked) {
            return picked.value;
          }
          console.error(`Enter 1-${choices.length} or the start of a choice.`);
        }
      } finally {
        rl.close();
      }
    }
  };
}
