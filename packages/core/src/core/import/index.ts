import { ValidationError } from '../../utils/errors.js';
import type { ImportOptions, ImportSpec, Importer } from './importer.js';
import { PlainTextImporter } from './plain-text-importer.js';

export type { ImportedFileTypes, ImportedForks, Importer, ImportOptions, ImportSpec } from './importer.js';
export { PlainTextImporter, reduceToASCII } from './plain-text-importer.js';

const IMPORTERS: ReadonlyMap<string, () => Importer> = new Map([
  [PlainTextImporter.TAG, () => new PlainTextImporter()]
]);

export function listImporterTags(): string[] {
  return [...IMPORTERS.keys()];
}

/**
 * Looks up an importer by tag and pairs it with its options.
 */
export function resolveImporter(tag: string, options: ImportOptions = {}): ImportSpec {
  const factory = IMPORTERS.get(tag.toLowerCase());
  if (!factory) {
    throw new ValidationError(`Unknown importer '${tag}'. Available: ${listImporterTags().join(', ')}`);
  }
  return { importer: factory(), options };
}

/**
 * Parses `key=value` option strings as given on the command line.
 */
export function parseImportOptions(pairs: readonly string[]): ImportOptions {
  const options: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new ValidationError(`Import option must be key=value, got '${pair}'`);
    }
    options[pair.substring(0, eq).trim()] = pair.substring(eq + 1).trim();
  }
  return options;
}
