export type { OutputPort, UnifiedSpinner } from './output.js';
export type { PromptPort, PromptChoice } from './prompt.js';
export type {
  ProgressPort,
  ProgressEvent,
  ProgressEventInput,
  ProgressEventBase,
  ClassifyProgressEvent,
  TransferProgressEvent
} from './progress.js';
export { emitProgress } from './progress.js';
export { consoleOutput } from './console-output.js';
export { nonInteractivePrompt, NonInteractivePromptError } from './console-prompt.js';
export { silentProgress } from './console-progress.js';
export { resolveOutput, resolvePrompt, resolveProgress } from './resolve.js';
