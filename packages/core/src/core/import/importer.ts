/**
 * Import converters turn a host file into the fork contents and file types
 * it should have on a legacy volume, e.g. a UTF-8 text file into a ProDOS
 * TXT file with CR line endings.
 *
 * A converter may run more than once for the same file, and one instance
 * converts any number of files.
 */

export interface ImportedFileTypes {
  fileType: number;
  auxType: number;
  hfsFileType: number;
  hfsCreator: number;
}

export interface ImportedForks {
  data: Uint8Array;
  /** null when the converter produces no resource fork */
  rsrc: Uint8Array | null;
}

/** Converter options, keyed by option tag. Unknown keys are ignored. */
export type ImportOptions = Readonly<Record<string, string>>;

export interface Importer {
  /** Short lower-case tag used in configuration and on the command line */
  readonly tag: string;
  readonly label: string;
  readonly hasDataFork: boolean;
  readonly hasRsrcFork: boolean;

  /** Removes an extension made redundant by the conversion, e.g. `.txt`. */
  stripExtension(fullPath: string): string;
  getFileTypes(): ImportedFileTypes;
  convertFile(input: Uint8Array, options: ImportOptions): ImportedForks;
}

/**
 * An importer together with the options it runs with.
 */
export interface ImportSpec {
  importer: Importer;
  options: ImportOptions;
}
