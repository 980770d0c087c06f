/**
 * @fileoverview Command setup for 'forkferry convert'
 *
 * Re-encodes host files into another preservation encoding, e.g. AppleDouble
 * pairs into NAPS-named files.
 */

import { configManager, validateConfigValue } from '@forkferry/core/core/config.js';
import { convertOptionsFromConfig, runConvertPipeline } from '@forkferry/core/core/convert/convert-pipeline.js';
import { parseImportOptions, resolveImporter } from '@forkferry/core/core/import/index.js';
import { resolveOutput } from '@forkferry/core/core/ports/resolve.js';
import { ValidationError } from '@forkferry/core/utils/errors.js';
import { createCliExecutionContext } from '../cli/context.js';
import { ConflictCallbackBridge, type ConflictPolicy } from '../cli/conflict-callback.js';

export interface ConvertCommandOptions {
  out: string;
  preserve?: string;
  import?: string;
  importOpt?: string[];
  overwrite?: boolean;
  skipExisting?: boolean;
  stripPaths?: boolean;
  napsExt?: boolean;
  dosText?: boolean;
  exclude?: string[];
  recurse?: boolean;
}

export function conflictPolicyFromFlags(options: Pick<ConvertCommandOptions, 'overwrite' | 'skipExisting'>): ConflictPolicy {
  if (options.overwrite && options.skipExisting) {
    throw new ValidationError('--overwrite and --skip-existing cannot be used together');
  }
  return options.overwrite ? 'overwrite' : options.skipExisting ? 'skip' : 'ask';
}

export async function setupConvertCommand(paths: string[], options: ConvertCommandOptions): Promise<void> {
  const policy = conflictPolicyFromFlags(options);
  const ctx = await createCliExecutionContext({ out: options.out, createTarget: true });
  const out = resolveOutput(ctx);

  const config = await configManager.getAll();
  const convertOptions = convertOptionsFromConfig(config);
  if (options.preserve !== undefined) {
    convertOptions.preserve = validateConfigValue('preserve', options.preserve.toLowerCase());
  }
  if (options.import !== undefined) {
    convertOptions.importSpec = resolveImporter(options.import, parseImportOptions(options.importOpt ?? []));
  }
  if (options.stripPaths !== undefined) {
    convertOptions.stripPaths = options.stripPaths;
  }
  if (options.napsExt !== undefined) {
    convertOptions.napsExtension = options.napsExt;
  }
  if (options.dosText !== undefined) {
    convertOptions.convertDOSText = options.dosText;
  }
  if (options.recurse !== undefined) {
    convertOptions.classifier.recurse = options.recurse;
  }
  convertOptions.classifier.exclude = options.exclude ?? [];

  // Without a terminal, an 'ask' conflict fails with a hint to pass a policy flag
  const bridge = new ConflictCallbackBridge(ctx, policy);
  const spinner = policy === 'ask' && ctx.interactive ? null : out.spinner();
  spinner?.start(`Converting to ${convertOptions.preserve}`);
  const result = await runConvertPipeline(ctx, paths, convertOptions, bridge.callback)
    .finally(() => spinner?.stop());

  const { overwritten, skipped, failures } = bridge.stats;
  const summary = `${result.records} record(s), ${result.items} item(s) written to ${ctx.targetDir}` +
    (overwritten > 0 ? `, ${overwritten} overwritten` : '') +
    (skipped > 0 ? `, ${skipped} skipped` : '') +
    (failures > 0 ? `, ${failures} failure(s)` : '');

  if (result.outcome.status === 'cancelled') {
    out.warn(`Conversion cancelled; files written before the cancel remain in ${ctx.targetDir}`);
    return;
  }
  out.success(summary);
}
