import type { ExecutionContext } from '../../types/execution-context.js';
import type { LogicalFileRecord } from '../classify/logical-file-record.js';
import { PreservationClassifier, type ClassifierOptions } from '../classify/preservation-classifier.js';
import { emitProgress } from '../ports/progress.js';
import { resolveProgress } from '../ports/resolve.js';

/**
 * Classifies host paths without transferring anything.
 */
export async function runScanPipeline(
  ctx: ExecutionContext,
  paths: readonly string[],
  options: Partial<ClassifierOptions> = {}
): Promise<LogicalFileRecord[]> {
  const progress = resolveProgress(ctx);
  emitProgress(progress, { type: 'classify:start', paths: paths.length });
  const records = await new PreservationClassifier(ctx.sourceCwd, options).classify(paths);
  emitProgress(progress, { type: 'classify:complete', records: records.length });
  return records;
}
