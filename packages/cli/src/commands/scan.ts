/**
 * @fileoverview Command setup for 'forkferry scan'
 *
 * Classifies host paths and prints what each file resolves to.
 */

import pico from 'picocolors';
import { configManager } from '@forkferry/core/core/config.js';
import { runScanPipeline } from '@forkferry/core/core/convert/scan-pipeline.js';
import type { LogicalFileRecord } from '@forkferry/core/core/classify/logical-file-record.js';
import { recordStoragePath } from '@forkferry/core/core/classify/logical-file-record.js';
import { fourCCToString, isLocked, isValidDate } from '@forkferry/core/core/attributes/file-attribs.js';
import { resolveOutput } from '@forkferry/core/core/ports/resolve.js';
import { createCliExecutionContext } from '../cli/context.js';

export interface ScanCommandOptions {
  recurse?: boolean;
  exclude?: string[];
  checkNamed?: boolean;
}

export async function setupScanCommand(paths: string[], options: ScanCommandOptions): Promise<void> {
  const ctx = await createCliExecutionContext();
  const config = await configManager.getAll();
  const records = await runScanPipeline(ctx, paths, {
    parseADF: config.parseADF,
    parseAS: config.parseAS,
    parseNAPS: config.parseNAPS,
    checkNamed: options.checkNamed ?? config.checkNamed,
    recurse: options.recurse ?? config.recurse,
    stripExt: config.stripExt,
    exclude: options.exclude ?? [],
  });

  const out = resolveOutput(ctx);
  if (records.length === 0) {
    out.info('Nothing to scan');
    return;
  }
  out.note(records.map(formatRecord).join('\n'), `${records.length} record(s)`);
}

export function formatRecord(record: LogicalFileRecord): string {
  const name = recordStoragePath(record);
  if (record.isDirectory) {
    return pico.blue(name + record.storageDirSep);
  }
  const forks: string[] = [];
  if (record.dataFork) {
    forks.push(`data:${record.dataFork.kind}`);
  }
  if (record.rsrcFork) {
    forks.push(`rsrc:${record.rsrcFork.kind}`);
  }
  const types = [
    `$${hex(record.fileType, 2)}/$${hex(record.auxType, 4)}`,
    `'${fourCCToString(record.hfsFileType)}'/'${fourCCToString(record.hfsCreator)}'`,
  ].join(' ');
  const modified = isValidDate(record.modWhen) ? record.modWhen.toISOString() : '-';
  const flags = [
    isLocked(record.access) ? pico.red('locked') : '',
    record.hasADFAttribs ? pico.dim('adf-attrs') : '',
  ].filter(flag => flag.length > 0);

  return [pico.bold(name), pico.cyan(forks.join(' ')), types, pico.dim(modified), ...flags].join('  ');
}

function hex(value: number, digits: number): string {
  return value.toString(16).toUpperCase().padStart(digits, '0');
}
