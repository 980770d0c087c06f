import { log } from '@clack/prompts';
import type { ProgressEvent, ProgressPort } from '@forkferry/core/core/ports/progress.js';

/**
 * Interactive progress. Per-fork percentages go to the convert spinner,
 * not the log.
 */
export function createClackProgress(): ProgressPort {
  return {
    emit(event: ProgressEvent): void {
      switch (event.type) {
        case 'classify:start':
          log.step(`Classifying ${event.paths} path(s)`);
          break;
        case 'classify:complete':
          log.info(`Found ${event.records} file(s) and folder(s)`);
          break;
        case 'transfer:start':
          log.step(`Transferring ${event.items} item(s) to ${event.target}`);
          break;
        case 'transfer:file':
          break;
        case 'transfer:notice':
          log.warn(`${event.path}: ${event.detail}`);
          break;
        case 'transfer:complete':
          if (event.status === 'cancelled') {
            log.warn(`Transfer to ${event.target} cancelled`);
          }
          break;
      }
    }
  };
}

/** Headless progress: record counts, notices and run outcomes only. */
export function createPlainProgress(): ProgressPort {
  return {
    emit(event: ProgressEvent): void {
      switch (event.type) {
        case 'classify:complete':
          console.log(`Found ${event.records} file(s) and folder(s)`);
          break;
        case 'transfer:notice':
          console.warn(`${event.path}: ${event.detail}`);
          break;
        case 'transfer:complete':
          console.log(`Transfer to ${event.target}: ${event.status}`);
          break;
        default:
          break;
      }
    }
  };
}
