import type { FileEntry } from '../capabilities/file-entry.js';

/**
 * Emits each ancestor directory of a set of leaves exactly once, root first.
 *
 * One synthesizer serves one destination. Paths are remembered
 * case-sensitively: "Dir" and "DIR" are both emitted, and a destination
 * that ignores case treats the second as a directory that already exists.
 */
export class DirectorySynthesizer {
  private readonly visited = new Set<string>();

  /** Marks `pathName` as emitted. Returns false if it already was. */
  claim(pathName: string): boolean {
    if (this.visited.has(pathName)) {
      return false;
    }
    this.visited.add(pathName);
    return true;
  }

  has(pathName: string): boolean {
    return this.visited.has(pathName);
  }

  /**
   * Ancestors of `pathName` not yet emitted, root first. They are claimed
   * by this call. The leaf itself is not included.
   */
  ancestorsOfPath(pathName: string, dirSep: string): string[] {
    if (dirSep === '') {
      return [];
    }
    const parts = pathName.split(dirSep);
    const result: string[] = [];
    let current = '';
    for (let i = 0; i < parts.length - 1; i++) {
      current = i === 0 ? parts[0] : current + dirSep + parts[i];
      if (current.length > 0 && this.claim(current)) {
        result.push(current);
      }
    }
    return result;
  }

  /**
   * Ancestor directory entries of `entry` below `boundary`, root first, with
   * their paths relative to the boundary. Only unclaimed ones are returned.
   */
  ancestorsOfEntry(entry: FileEntry, boundary: FileEntry | null, dirSep: string): Array<{ entry: FileEntry; path: string }> {
    const chain: FileEntry[] = [];
    for (let dir = entry.containingDir; dir && !isStop(dir, boundary); dir = dir.containingDir) {
      chain.unshift(dir);
    }
    const result: Array<{ entry: FileEntry; path: string }> = [];
    let current = '';
    for (const dir of chain) {
      current = current.length === 0 ? dir.fileName : current + dirSep + dir.fileName;
      if (this.claim(current)) {
        result.push({ entry: dir, path: current });
      }
    }
    return result;
  }
}

/** True at the boundary itself or at the volume directory. */
function isStop(dir: FileEntry, boundary: FileEntry | null): boolean {
  return dir === boundary || dir.containingDir === null;
}

/**
 * Path of `entry` relative to `boundary`, joined with `dirSep`. The
 * boundary and the volume directory never appear in the result.
 */
export function relativeEntryPath(entry: FileEntry, boundary: FileEntry | null, dirSep: string): string {
  const names: string[] = [entry.fileName];
  for (let dir = entry.containingDir; dir && !isStop(dir, boundary); dir = dir.containingDir) {
    names.unshift(dir.fileName);
  }
  return names.join(dirSep);
}
