/**
 * User-facing output for scan reports, transfer summaries and the notices
 * raised while files move. The engine never writes to the terminal itself.
 */

export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

export interface OutputPort {
  info(message: string): void;
  /** Bare line, used for single values such as `config get` */
  message(message: string): void;
  success(message: string): void;
  error(message: string): void;
  /** Transfer notices: skipped names, blocked writes, per-file failures */
  warn(message: string): void;
  /** Multi-line block such as a record listing, under an optional heading */
  note(content: string, title?: string): void;
  spinner(): UnifiedSpinner;
}
