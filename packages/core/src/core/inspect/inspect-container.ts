import { promises as fs } from 'fs';
import path from 'path';
import { EntryID, readContainer, type AppleSingleHeader } from '../apple-single/apple-single.js';

export interface ContainerReport {
  hostPath: string;
  fileSize: number;
  header: AppleSingleHeader;
  /** One line per entry descriptor, in file order */
  entries: Array<{ id: number; name: string; offset: number; length: number }>;
}

const ENTRY_NAMES: Readonly<Record<number, string>> = {
  [EntryID.DataFork]: 'data fork',
  [EntryID.RsrcFork]: 'resource fork',
  [EntryID.RealName]: 'real name',
  [EntryID.Comment]: 'comment',
  [EntryID.IconBW]: 'icon (b/w)',
  [EntryID.IconColor]: 'icon (color)',
  [EntryID.FileInfo]: 'file info',
  [EntryID.FileDates]: 'file dates',
  [EntryID.FinderInfo]: 'Finder info',
  [EntryID.MacFileInfo]: 'Mac file info',
  [EntryID.ProDOSFileInfo]: 'ProDOS file info',
  [EntryID.MSDOSFileInfo]: 'MS-DOS file info'
};

export function entryName(id: number): string {
  return ENTRY_NAMES[id] ?? `unknown (${id})`;
}

/**
 * Parses an AppleSingle or AppleDouble file on purpose. Unlike
 * classification, a malformed file is an error here (FormatError).
 */
export async function inspectContainerFile(hostPath: string, cwd: string = process.cwd()): Promise<ContainerReport> {
  const fullPath = path.resolve(cwd, hostPath);
  const bytes = await fs.readFile(fullPath);
  const header = readContainer(bytes, fullPath);
  return {
    hostPath: fullPath,
    fileSize: bytes.length,
    header,
    entries: header.entries.map(entry => ({ ...entry, name: entryName(entry.id) }))
  };
}
