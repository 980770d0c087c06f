/**
 * Conflict Callback Bridge
 *
 * Answers the engine's transfer callbacks from the CLI: progress goes to the
 * progress port, notices to the output port, and name conflicts are either
 * answered by the chosen policy or asked through the prompt port.
 */

import {
  CallbackReason,
  CallbackResult,
  type CallbackFacts,
  type TransferCallback,
} from '@forkferry/core/core/callbacks/callback-facts.js';
import type { OutputPort } from '@forkferry/core/core/ports/output.js';
import type { PromptPort } from '@forkferry/core/core/ports/prompt.js';
import { emitProgress, type ProgressPort } from '@forkferry/core/core/ports/progress.js';
import { resolveOutput, resolveProgress, resolvePrompt } from '@forkferry/core/core/ports/resolve.js';

/** How an existing destination file is handled. */
export type ConflictPolicy = 'ask' | 'overwrite' | 'skip';

type ConflictAnswer = 'skip' | 'overwrite' | 'skip-all' | 'overwrite-all' | 'cancel';

export interface ConflictStats {
  overwritten: number;
  skipped: number;
  notices: number;
  failures: number;
}

export interface CallbackPorts {
  output?: OutputPort;
  prompt?: PromptPort;
  progress?: ProgressPort;
}

export class ConflictCallbackBridge {
  readonly stats: ConflictStats = { overwritten: 0, skipped: 0, notices: 0, failures: 0 };
  private policy: ConflictPolicy;
  private cancelRequested = false;
  private readonly output: OutputPort;
  private readonly prompt: PromptPort;
  private readonly progress: ProgressPort;

  constructor(ports: CallbackPorts, policy: ConflictPolicy = 'ask') {
    this.output = resolveOutput(ports);
    this.prompt = resolvePrompt(ports);
    this.progress = resolveProgress(ports);
    this.policy = policy;
  }

  get wasCancelled(): boolean {
    return this.cancelRequested;
  }

  readonly callback: TransferCallback = facts => this.answer(facts);

  private async answer(facts: CallbackFacts): Promise<CallbackResult> {
    switch (facts.reason) {
      case CallbackReason.Progress:
        if (facts.progressPercent >= 0) {
          emitProgress(this.progress, {
            type: 'transfer:file',
            path: facts.origPathName,
            part: facts.part,
            percent: facts.progressPercent,
          });
        }
        return CallbackResult.Proceed;

      case CallbackReason.QueryCancel:
        return this.cancelRequested ? CallbackResult.Cancel : CallbackResult.Proceed;

      case CallbackReason.FileNameExists:
        return this.resolveExisting(facts);

      case CallbackReason.OverwriteFailure:
        this.output.warn(`Cannot write '${facts.newPathName}': ${facts.failMessage}`);
        return this.skipOrCancel(facts);

      case CallbackReason.PathTooLong:
        this.output.warn(`Name too long for destination, skipping '${facts.origPathName}'`);
        this.stats.skipped++;
        return CallbackResult.Skip;

      case CallbackReason.ResourceForkIgnored:
        this.notice(facts.origPathName, 'resource fork dropped, destination cannot store it');
        return CallbackResult.Proceed;

      case CallbackReason.AttrFailure:
        this.notice(facts.newPathName, `attributes not set: ${facts.failMessage}`);
        return CallbackResult.Proceed;

      case CallbackReason.Failure:
        this.stats.failures++;
        this.output.warn(facts.failMessage);
        return CallbackResult.Proceed;
    }
  }

  private notice(pathName: string, detail: string): void {
    this.stats.notices++;
    emitProgress(this.progress, { type: 'transfer:notice', path: pathName, detail });
  }

  private async resolveExisting(facts: CallbackFacts): Promise<CallbackResult> {
    if (this.policy === 'overwrite') {
      this.stats.overwritten++;
      return CallbackResult.Overwrite;
    }
    if (this.policy === 'skip') {
      this.stats.skipped++;
      return CallbackResult.Skip;
    }

    const answer = await this.prompt.select<ConflictAnswer>(
      `'${facts.newPathName}' already exists`,
      [
        { title: 'Overwrite', value: 'overwrite' },
        { title: 'Skip', value: 'skip' },
        { title: 'Overwrite all', value: 'overwrite-all', description: 'do not ask again' },
        { title: 'Skip all', value: 'skip-all', description: 'do not ask again' },
        { title: 'Cancel', value: 'cancel' },
      ],
      `(copying '${facts.origPathName}')`
    );
    switch (answer) {
      case 'overwrite-all':
        this.policy = 'overwrite';
        this.stats.overwritten++;
        return CallbackResult.Overwrite;
      case 'overwrite':
        this.stats.overwritten++;
        return CallbackResult.Overwrite;
      case 'skip-all':
        this.policy = 'skip';
        this.stats.skipped++;
        return CallbackResult.Skip;
      case 'skip':
        this.stats.skipped++;
        return CallbackResult.Skip;
      case 'cancel':
        this.cancelRequested = true;
        return CallbackResult.Cancel;
    }
  }

  private async skipOrCancel(facts: CallbackFacts): Promise<CallbackResult> {
    if (this.policy !== 'ask') {
      this.stats.skipped++;
      return CallbackResult.Skip;
    }
    const skip = await this.prompt.confirm(`Skip '${facts.origPathName}' and continue?`, true);
    if (skip) {
      this.stats.skipped++;
      return CallbackResult.Skip;
    }
    this.cancelRequested = true;
    return CallbackResult.Cancel;
  }
}
