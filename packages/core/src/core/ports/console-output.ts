import type { OutputPort, UnifiedSpinner } from './output.js';

/**
 * Plain stdout/stderr output for headless runs. Warnings and errors go to
 * stderr so a piped record listing stays clean.
 */
export const consoleOutput: OutputPort = {
  info: message => console.log(message),
  message: message => console.log(message),
  success: message => console.log(`✓ ${message}`),
  error: message => console.error(`✗ ${message}`),
  warn: message => console.error(`⚠ ${message}`),

  note(content: string, title?: string): void {
    console.log(title ? `\n${title}\n${content}` : `\n${content}`);
  },

  spinner(): UnifiedSpinner {
    let current = '';
    return {
      start(message: string) {
        current = message;
        console.log(`… ${message}`);
      },
      stop(finalMessage?: string) {
        console.log(`✓ ${finalMessage ?? current}`);
      },
      message(text: string) {
        current = text;
      }
    };
  }
};
