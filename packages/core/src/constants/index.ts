/**
 * Shared constants for forkferry
 * Single source of truth for the naming conventions, file type numbers and
 * buffer sizes used throughout the engine.
 */

export const DIR_PATTERNS = {
  FORKFERRY: '.forkferry'
} as const;

export const CONFIG_FILE_NAMES = ['config.jsonc', 'config.json'] as const;

/**
 * Filename conventions of the preservation encodings.
 */
export const NAMING = {
  /** AppleDouble sidecar prefix: `._name` holds the resource fork of `name` */
  ADF_PREFIX: '._',
  /** AppleSingle suffix, compared case-insensitively */
  AS_EXT: '.as',
  /** MacZip puts AppleDouble headers for `dir/name` at `__MACOSX/dir/._name` */
  MAC_ZIP_DIR: '__MACOSX',
  /** Resource fork path on hosts that expose named forks (macOS) */
  NAMED_FORK_RSRC: '..namedfork/rsrc',
  /** Escape character for illegal host filename characters */
  ESCAPE_CHAR: '%',
  /** Replacement for illegal characters when escaping is not in use */
  DEFAULT_REPL_CHAR: '_',
  /** Stand-in for a name that would otherwise be empty */
  MIRANDA_FILENAME: 'A',
  NAPS_TAG_CHAR: '#'
} as const;

/**
 * ProDOS file types the engine treats specially.
 */
export const FILE_TYPES = {
  NON: 0x00,
  TXT: 0x04,
  BIN: 0x06,
  DIR: 0x0f,
  S16: 0xb3,
  MDI: 0xd7,
  SND: 0xd8,
  LBR: 0xe0,
  SYS: 0xff
} as const;

/**
 * HFS types and creators, as big-endian four-character codes.
 */
export const HFS_TYPES = {
  AIFC: 0x41494643, // 'AIFC'
  AIFF: 0x41494646, // 'AIFF'
  BINA: 0x42494e41, // 'BINA'
  DIMG: 0x64496d67, // 'dImg'
  MIDI: 0x4d494449, // 'MIDI'
  PSYS: 0x50535953, // 'PSYS'
  PS16: 0x50533136, // 'PS16'
  TEXT: 0x54455854  // 'TEXT'
} as const;

export const HFS_CREATORS = {
  CPII: 0x43504949, // 'CPII'
  DCPY: 0x64437079, // 'dCpy'
  PDOS: 0x70646f73  // 'pdos'
} as const;

/**
 * ProDOS access bits.
 */
export const ACCESS_FLAGS = {
  READ: 0x01,
  WRITE: 0x02,
  INVISIBLE: 0x04,
  BACKUP: 0x20,
  RENAME: 0x40,
  DELETE: 0x80
} as const;

/** Access value of a locked file: read only. */
export const FILE_ACCESS_LOCKED = ACCESS_FLAGS.READ;
/** Access value of an unlocked file: read, write, rename, delete. */
export const FILE_ACCESS_UNLOCKED =
  ACCESS_FLAGS.DELETE | ACCESS_FLAGS.RENAME | ACCESS_FLAGS.WRITE | ACCESS_FLAGS.READ;

export const TRANSFER_LIMITS = {
  /** Size of the scratch buffer forks are streamed through */
  COPY_BUFFER_SIZE: 32768,
  /** Longest filename an AppleSingle container will hold */
  MAX_CONTAINER_NAME: 1024
} as const;
