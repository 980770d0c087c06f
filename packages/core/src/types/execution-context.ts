import type { OutputPort } from '../core/ports/output.js';
import type { ProgressPort } from '../core/ports/progress.js';
import type { PromptPort } from '../core/ports/prompt.js';

/** `rich` renders through clack; `plain` is console lines and readline. */
export type OutputMode = 'rich' | 'plain';

/**
 * Where a command reads its arguments from and writes converted files to,
 * plus the ports it reports through. Unset ports fall back to the
 * `resolve*` defaults.
 */
export interface ExecutionContext {
  /** Host paths on the command line resolve against this. */
  sourceCwd: string;
  /** Absolute folder converted files land in. */
  targetDir: string;
  /** Whether conflict prompts can be answered. */
  interactive?: boolean;
  output?: OutputPort;
  prompt?: PromptPort;
  progress?: ProgressPort;
  outputMode?: OutputMode;
}

export interface ExecutionOptions {
  /** `--out`, relative to the working directory */
  out?: string;
  /** Create the target folder when missing */
  createTarget?: boolean;
  interactive?: boolean;
}
