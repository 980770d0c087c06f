/**
 * Structured progress from the scan and convert pipelines. The engine emits
 * and moves on; frontends decide what to show.
 */

export interface ProgressEventBase {
  /** ISO 8601 */
  timestamp: string;
}

export type ClassifyProgressEvent =
  | { type: 'classify:start'; paths: number }
  | { type: 'classify:complete'; records: number };

/** One start/complete pair per executor run. */
export type TransferProgressEvent =
  | { type: 'transfer:start'; target: string; items: number }
  | { type: 'transfer:file'; path: string; part: 'data' | 'rsrc'; percent: number }
  | { type: 'transfer:notice'; path: string; detail: string }
  | { type: 'transfer:complete'; target: string; status: 'completed' | 'cancelled' };

export type ProgressEventInput = ClassifyProgressEvent | TransferProgressEvent;

export type ProgressEvent = ProgressEventBase & ProgressEventInput;

export interface ProgressPort {
  emit(event: ProgressEvent): void;
}

export function emitProgress(port: ProgressPort, event: ProgressEventInput): void {
  port.emit({ ...event, timestamp: new Date().toISOString() });
}
