import type { FilePart } from '../../types/index.js';

/**
 * Why the engine is calling back.
 */
export enum CallbackReason {
  /** Informational; the answer is ignored */
  Progress = 'progress',
  /** Asked between units of work; answer Cancel to stop */
  QueryCancel = 'query-cancel',
  /** The destination cannot hold a resource fork that exists; the fork is dropped */
  ResourceForkIgnored = 'resource-fork-ignored',
  /** Name too long for the destination: Skip or Cancel */
  PathTooLong = 'path-too-long',
  /** Name collision: Skip, Overwrite or Cancel */
  FileNameExists = 'file-name-exists',
  /** A host output path is held by a directory: Skip or Cancel */
  OverwriteFailure = 'overwrite-failure',
  /** Dates or permissions could not be set on a host file; not fatal */
  AttrFailure = 'attr-failure',
  /** Something went wrong; see `failMessage` */
  Failure = 'failure'
}

export enum CallbackResult {
  Proceed = 'proceed',
  Cancel = 'cancel',
  Skip = 'skip',
  Overwrite = 'overwrite'
}

/** Text conversion applied to a data fork while it is copied. */
export type DOSConvMode = 'none' | 'from-dos' | 'to-dos';

/**
 * Everything the caller is told about the current unit of work.
 */
export interface CallbackFacts {
  reason: CallbackReason;
  origPathName: string;
  origDirSep: string;
  origModWhen: Date | null;
  newPathName: string;
  newDirSep: string;
  newModWhen: Date | null;
  /** 0-100, or -1 when unknown */
  progressPercent: number;
  part: FilePart;
  failMessage: string;
  dosConv: DOSConvMode;
}

/**
 * The single channel from the engine back to its caller. Every call is
 * awaited before the engine continues.
 */
export type TransferCallback = (facts: CallbackFacts) => CallbackResult | Promise<CallbackResult>;

export function createFacts(reason: CallbackReason, init: Partial<Omit<CallbackFacts, 'reason'>> = {}): CallbackFacts {
  return {
    reason,
    origPathName: '',
    origDirSep: '',
    origModWhen: null,
    newPathName: '',
    newDirSep: '',
    newModWhen: null,
    progressPercent: -1,
    part: 'data',
    failMessage: '',
    dosConv: 'none',
    ...init
  };
}

/** Callback that lets everything proceed and overwrites nothing. */
export const proceedCallback: TransferCallback = facts =>
  facts.reason === CallbackReason.FileNameExists ? CallbackResult.Skip : CallbackResult.Proceed;

/** Outcome of a batch. Cancellation is an outcome, not an error. */
export type BatchOutcome = { status: 'completed' } | { status: 'cancelled' };

export const COMPLETED: BatchOutcome = { status: 'completed' };
export const CANCELLED: BatchOutcome = { status: 'cancelled' };

/** Edits in place (move, rename, set attributes) can also stop on a failure, already reported. */
export type EditOutcome = BatchOutcome | { status: 'failed' };

export const FAILED: EditOutcome = { status: 'failed' };
