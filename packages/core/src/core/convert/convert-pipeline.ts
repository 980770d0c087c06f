import type { ExecutionContext } from '../../types/execution-context.js';
import type { ForkferryConfig, PreserveMode } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import {
  CANCELLED,
  COMPLETED,
  proceedCallback,
  type BatchOutcome,
  type TransferCallback
} from '../callbacks/callback-facts.js';
import {
  DEFAULT_CLASSIFIER_OPTIONS,
  PreservationClassifier,
  type ClassifierOptions
} from '../classify/preservation-classifier.js';
import { FileSystemExecutor } from '../execute/filesystem-executor.js';
import { HostExtractWorker } from '../execute/host-extract-worker.js';
import type { ImportSpec } from '../import/importer.js';
import { MemoryVolume } from '../memory/memory-volume.js';
import type { TransferItem } from '../plan/transfer-item.js';
import { TransferPlanner } from '../plan/transfer-planner.js';
import { emitProgress } from '../ports/progress.js';
import { resolveProgress } from '../ports/resolve.js';

export interface ConvertOptions {
  preserve: PreserveMode;
  classifier: Omit<ClassifierOptions, 'importSpec'>;
  importSpec: ImportSpec | null;
  stripPaths: boolean;
  napsExtension: boolean;
  convertDOSText: boolean;
  /** Clear write permission on extracted files whose source is locked */
  setAccess: boolean;
}

export interface ConvertResult {
  outcome: BatchOutcome;
  records: number;
  /** Items handed to the host writer before the run ended */
  items: number;
}

/**
 * Builds convert options from the saved configuration. Command-line flags
 * are applied on top by the caller.
 */
export function convertOptionsFromConfig(config: ForkferryConfig, overrides: Partial<ConvertOptions> = {}): ConvertOptions {
  return {
    preserve: config.preserve,
    classifier: {
      ...DEFAULT_CLASSIFIER_OPTIONS,
      parseADF: config.parseADF,
      parseAS: config.parseAS,
      parseNAPS: config.parseNAPS,
      checkNamed: config.checkNamed,
      recurse: config.recurse,
      stripExt: config.stripExt
    },
    importSpec: null,
    stripPaths: config.stripPaths,
    napsExtension: config.napsExtension,
    convertDOSText: config.convertDOSText,
    setAccess: true,
    ...overrides
  };
}

/**
 * Re-encodes host files from whatever preservation encodings they carry
 * into `options.preserve`, writing the result to `ctx.targetDir`.
 *
 * Each classified record is staged with its native forks in its own
 * in-memory volume, planned from that volume and extracted before the next
 * record is staged, so only one file's content is held at a time. Staging
 * goes through the filesystem executor, so cancellation behaves the same
 * way it does for a disk image; name conflicts surface at the host writer.
 */
export async function runConvertPipeline(
  ctx: ExecutionContext,
  paths: readonly string[],
  options: ConvertOptions,
  callback: TransferCallback = proceedCallback
): Promise<ConvertResult> {
  const progress = resolveProgress(ctx);

  emitProgress(progress, { type: 'classify:start', paths: paths.length });
  const classifier = new PreservationClassifier(ctx.sourceCwd, { ...options.classifier, importSpec: options.importSpec });
  const records = await classifier.classify(paths);
  emitProgress(progress, { type: 'classify:complete', records: records.length });

  const stagePlanner = new TransferPlanner({ preserve: 'host', stripPaths: options.stripPaths }, callback);
  const batches = records.map(record => stagePlanner.planRecords([record], options.importSpec));
  const targetPlanner = new TransferPlanner({
    preserve: options.preserve,
    stripPaths: false,
    macZip: false,
    napsExtension: options.napsExtension
  }, callback);
  const worker = new HostExtractWorker(ctx.targetDir, callback, {
    convertDOSText: options.convertDOSText,
    setAccess: options.setAccess
  });

  const staged = batches.reduce((count, batch) => count + batch.length, 0);
  emitProgress(progress, { type: 'transfer:start', target: ctx.targetDir, items: staged });
  let outcome: BatchOutcome = COMPLETED;
  let extracted = 0;
  for (const batch of batches) {
    const items = await stageBatch(batch, targetPlanner, options, callback);
    if (!items) {
      outcome = CANCELLED;
      break;
    }
    extracted += items.length;
    outcome = await worker.extract(items);
    if (outcome.status === 'cancelled') {
      break;
    }
  }
  logger.debug(`Extracted ${extracted} item(s) in ${options.preserve} mode`);
  emitProgress(progress, { type: 'transfer:complete', target: ctx.targetDir, status: outcome.status });

  return { outcome, records: records.length, items: extracted };
}

/**
 * Stages one record's items in a fresh volume and plans them for the host.
 * Returns null when staging was cancelled.
 */
async function stageBatch(
  batch: readonly TransferItem[],
  targetPlanner: TransferPlanner,
  options: ConvertOptions,
  callback: TransferCallback
): Promise<TransferItem[] | null> {
  const volume = new MemoryVolume({ name: 'Staging' });
  const executor = new FileSystemExecutor(volume, null, callback, { stripPaths: options.stripPaths });
  const stageOutcome = await executor.execute(batch);
  if (stageOutcome.status === 'cancelled') {
    return null;
  }
  const root = volume.getVolDirEntry();
  return targetPlanner.planFileSystem(volume, [root], root);
}
