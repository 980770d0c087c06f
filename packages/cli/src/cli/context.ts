import type { ExecutionContext, ExecutionOptions, OutputMode } from '@forkferry/core/types/execution-context.js';
import { createExecutionContext } from '@forkferry/core/core/execution-context.js';
import { nonInteractivePrompt } from '@forkferry/core/core/ports/console-prompt.js';
import type { OutputPort } from '@forkferry/core/core/ports/output.js';
import type { ProgressPort } from '@forkferry/core/core/ports/progress.js';
import type { PromptPort } from '@forkferry/core/core/ports/prompt.js';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';
import { createClackProgress, createPlainProgress } from './clack-progress-adapter.js';
import { createClackPrompt } from './clack-prompt-adapter.js';
import { createPlainPrompt } from './plain-prompt-adapter.js';

export interface CliContextOptions extends ExecutionOptions {
  /** Defaults to `'plain'` under `--plain` or off a terminal, `'rich'` otherwise. */
  outputMode?: OutputMode;
}

interface PortSet {
  output: OutputPort;
  prompt: PromptPort;
  progress: ProgressPort;
}

const portCache = new Map<OutputMode, PortSet>();

function portsFor(mode: OutputMode): PortSet {
  let ports = portCache.get(mode);
  if (!ports) {
    ports = mode === 'rich'
      ? { output: createClackOutput(), prompt: createClackPrompt(), progress: createClackProgress() }
      : { output: createPlainOutput(), prompt: createPlainPrompt(), progress: createPlainProgress() };
    portCache.set(mode, ports);
  }
  return ports;
}

/** A terminal on stdin outside CI. */
export function detectInteractive(): boolean {
  return process.stdin.isTTY === true && process.env.CI !== 'true';
}

export function defaultOutputMode(interactive: boolean): OutputMode {
  return interactive && process.env.FORKFERRY_PLAIN !== '1' ? 'rich' : 'plain';
}

/**
 * Context for one command run. Conflict prompts are only wired when the
 * session can answer them; otherwise `ask` fails fast.
 */
export async function createCliExecutionContext(options: CliContextOptions = {}): Promise<ExecutionContext> {
  const interactive = options.interactive ?? detectInteractive();
  const ctx = await createExecutionContext({ ...options, interactive });
  const mode = options.outputMode ?? defaultOutputMode(interactive);
  const ports = portsFor(mode);
  ctx.outputMode = mode;
  ctx.output = ports.output;
  ctx.prompt = interactive ? ports.prompt : nonInteractivePrompt;
  ctx.progress = ports.progress;
  return ctx;
}
