export {
  BasePartSource,
  drainPartSource,
  openSourceCount,
  readPartSource,
  usePartSource,
  type PartSource
} from './part-source.js';
export { HostFilePartSource } from './host-file-source.js';
export { EntryPartSource, StreamPartSource } from './stream-source.js';
export {
  BufferedPartSource,
  ContainerPartSource,
  GeneratedPartSource,
  ImportPartSource
} from './buffered-source.js';
export { ProgressPartSource } from './progress-source.js';
