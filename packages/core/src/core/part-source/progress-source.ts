import { TransferCancelledError } from '../../utils/errors.js';
import {
  CallbackReason,
  CallbackResult,
  type CallbackFacts,
  type TransferCallback
} from '../callbacks/callback-facts.js';
import { BasePartSource, type PartSource } from './part-source.js';

/**
 * Reports progress when an archive commit reaches this part. The caller is
 * asked whether to cancel first; a Cancel answer aborts the commit.
 */
export class ProgressPartSource extends BasePartSource {
  constructor(
    private readonly inner: PartSource,
    private readonly callback: TransferCallback,
    private readonly facts: Omit<CallbackFacts, 'reason'>
  ) {
    super(inner.label);
  }

  protected async doOpen(): Promise<void> {
    const answer = await this.callback({ ...this.facts, reason: CallbackReason.QueryCancel });
    if (answer === CallbackResult.Cancel) {
      throw new TransferCancelledError();
    }
    await this.callback({ ...this.facts, reason: CallbackReason.Progress });
    await this.inner.open();
  }

  protected doRead(buf: Uint8Array, offset: number, count: number): Promise<number> {
    return this.inner.read(buf, offset, count);
  }

  protected doRewind(): Promise<void> {
    return this.inner.rewind();
  }

  protected doClose(): Promise<void> {
    return this.inner.close();
  }
}
