import type { ExecutionContext } from '../../types/execution-context.js';
import { silentProgress } from './console-progress.js';
import { consoleOutput } from './console-output.js';
import { nonInteractivePrompt } from './console-prompt.js';
import type { OutputPort } from './output.js';
import type { ProgressPort } from './progress.js';
import type { PromptPort } from './prompt.js';

type PortSource<K extends keyof ExecutionContext> = Pick<ExecutionContext, K> | undefined;

export function resolveOutput(ctx?: PortSource<'output'>): OutputPort {
  return ctx?.output ?? consoleOutput;
}

/** Without a prompt, any conflict that reaches `ask` throws. */
export function resolvePrompt(ctx?: PortSource<'prompt'>): PromptPort {
  return ctx?.prompt ?? nonInteractivePrompt;
}

/** Progress is opt-in; headless runs report nothing. */
export function resolveProgress(ctx?: PortSource<'progress'>): ProgressPort {
  return ctx?.progress ?? silentProgress;
}
