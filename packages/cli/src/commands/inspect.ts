/**
 * @fileoverview Command setup for 'forkferry inspect'
 */

import pico from 'picocolors';
import { fourCCToString, isValidDate } from '@forkferry/core/core/attributes/file-attribs.js';
import { inspectContainerFile, type ContainerReport } from '@forkferry/core/core/inspect/inspect-container.js';
import { resolveOutput } from '@forkferry/core/core/ports/resolve.js';
import { createCliExecutionContext } from '../cli/context.js';

export async function setupInspectCommand(file: string): Promise<void> {
  const ctx = await createCliExecutionContext();
  const report = await inspectContainerFile(file, ctx.sourceCwd);
  const out = resolveOutput(ctx);
  out.note(formatReport(report), report.hostPath);
}

export function formatReport(report: ContainerReport): string {
  const { header } = report;
  const attrs = header.attrs;
  const kind = header.kind === 'apple-single' ? 'AppleSingle' : 'AppleDouble';
  const lines = [
    `${pico.bold(kind)} v${header.version}` +
      (header.version === 1 ? ` (home: ${header.homeFS})` : '') +
      (header.isLittleEndian ? pico.yellow(' little-endian') : '') +
      (header.isDubious ? pico.red(' dubious') : ''),
    `size      ${report.fileSize}`,
    `name      ${header.fileName.length > 0 ? header.fileName : pico.dim('(none)')}`,
    `ProDOS    $${attrs.fileType.toString(16).toUpperCase().padStart(2, '0')}/$${attrs.auxType.toString(16).toUpperCase().padStart(4, '0')}`,
    `HFS       '${fourCCToString(attrs.hfsFileType)}'/'${fourCCToString(attrs.hfsCreator)}'`,
    `access    $${attrs.access.toString(16).toUpperCase().padStart(2, '0')}`,
    `created   ${isValidDate(attrs.createWhen) ? attrs.createWhen.toISOString() : '-'}`,
    `modified  ${isValidDate(attrs.modWhen) ? attrs.modWhen.toISOString() : '-'}`,
    '',
    pico.bold('entries'),
    ...report.entries.map(entry =>
      `  ${String(entry.id).padStart(2)}  ${entry.name.padEnd(18)} +${entry.offset} (${entry.length} bytes)`
    ),
  ];
  for (const note of header.notes) {
    lines.push(pico.dim(`note: ${note}`));
  }
  return lines.join('\n');
}
