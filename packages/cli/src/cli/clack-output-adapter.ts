import { log, spinner as clackSpinner, note as clackNote } from '@clack/prompts';
import pico from 'picocolors';
import type { OutputPort, UnifiedSpinner } from '@forkferry/core/core/ports/output.js';
import { Spinner } from '../utils/spinner.js';

/**
 * Output for an interactive terminal. Record listings render as clack notes;
 * the spinner is suppressed while a conflict prompt could be on screen.
 */
export function createClackOutput(): OutputPort {
  return {
    info: message => log.info(message),
    message: message => log.message(message),
    success: message => log.success(message),
    error: message => log.error(message),
    warn: message => log.warn(message),
    note: (content, title) => clackNote(content, title ?? ''),

    spinner(): UnifiedSpinner {
      const s = clackSpinner();
      let running = false;
      return {
        start(message: string) {
          if (!running) {
            s.start(message);
            running = true;
          }
        },
        stop(finalMessage?: string) {
          if (running) {
            s.stop(finalMessage);
            running = false;
          }
        },
        message(text: string) {
          if (running) {
            s.message(text);
          }
        }
      };
    }
  };
}

/**
 * Output for CI and piped runs: colored markers, notices on stderr.
 */
export function createPlainOutput(): OutputPort {
  return {
    info: message => console.log(message),
    message: message => console.log(message),
    success: message => console.log(`${pico.green('✓')} ${message}`),
    error: message => console.error(`${pico.red('✗')} ${message}`),
    warn: message => console.warn(`${pico.yellow('⚠')} ${message}`),

    note(content: string, title?: string): void {
      console.log(title ? `\n${pico.bold(title)}\n${content}` : `\n${content}`);
    },

    spinner(): UnifiedSpinner {
      let active: Spinner | null = null;
      return {
        start(message: string) {
          active = new Spinner(message);
          active.start();
        },
        stop(finalMessage?: string) {
          if (!active) {
            return;
          }
          active.stop();
          active = null;
          if (finalMessage) {
            console.log(finalMessage);
          }
        },
        message(text: string) {
          active?.update(text);
        }
      };
    }
  };
}
