/**
 * @forkferry/core - Transfer engine
 *
 * Moves forked, typed files between legacy Apple volumes, file archives and
 * the host filesystem. This package has ZERO terminal/UI dependencies; the
 * CLI drives it through callbacks and the port interfaces.
 */

// ============================================================================
// Port Interfaces (the primary abstraction boundary)
// ============================================================================

export * from './core/ports/index.js';

// ============================================================================
// Execution Context & Configuration
// ============================================================================

export { createExecutionContext } from './core/execution-context.js';
export {
  configManager,
  ConfigManager,
  CONFIG_KEYS,
  DEFAULT_CONFIG,
  getForkferryDirectories,
  isConfigKey,
  parseConfigValue,
  validateConfigValue,
  type ConfigKey,
} from './core/config.js';

// ============================================================================
// Callback Protocol
// ============================================================================

export {
  CallbackReason,
  CallbackResult,
  CANCELLED,
  COMPLETED,
  createFacts,
  FAILED,
  proceedCallback,
  type BatchOutcome,
  type CallbackFacts,
  type EditOutcome,
  type DOSConvMode,
  type TransferCallback,
} from './core/callbacks/callback-facts.js';

// ============================================================================
// Capabilities
// ============================================================================

export type { Archive, ArchiveCharacteristics } from './core/capabilities/archive.js';
export type { FileEntry, ForkReader, ForkWriter } from './core/capabilities/file-entry.js';
export type { CreateMode, FileSystem, FileSystemCharacteristics } from './core/capabilities/file-system.js';
export { archiveEndpoint, fileSystemEndpoint, type Endpoint } from './core/capabilities/endpoint.js';
export { MemoryEntry, MemoryVolume, type MemoryVolumeOptions } from './core/memory/memory-volume.js';

// ============================================================================
// Classification, Planning, Execution
// ============================================================================

export {
  classifyHostPaths,
  DEFAULT_CLASSIFIER_OPTIONS,
  PreservationClassifier,
  type ClassifierOptions,
} from './core/classify/preservation-classifier.js';
export type { ForkSource, LogicalFileRecord } from './core/classify/logical-file-record.js';
export { recordStoragePath } from './core/classify/logical-file-record.js';

export { DirectorySynthesizer } from './core/plan/directory-synthesizer.js';
export { DEFAULT_PLAN_OPTIONS, TransferPlanner, type PlanOptions } from './core/plan/transfer-planner.js';
export { describeItem, type ItemOrigin, type TransferItem } from './core/plan/transfer-item.js';

export { ArchiveExecutor, type ArchiveExecOptions } from './core/execute/archive-executor.js';
export { FileSystemExecutor, type FileSystemExecOptions } from './core/execute/filesystem-executor.js';
export { HostExtractWorker, type HostExtractOptions } from './core/execute/host-extract-worker.js';
export { DeleteWorker, type DeleteOptions } from './core/delete/delete-worker.js';
export { MoveWorker, NO_CHANGE, type ArchiveRename, type MoveOptions } from './core/move/move-worker.js';
export {
  applyAttrEdits,
  SetAttrWorker,
  validateAttrEdits,
  type AttrEdits,
  type SetAttrOptions,
} from './core/attributes/set-attr-worker.js';

// ============================================================================
// Formats & Naming
// ============================================================================

export {
  buildContainer,
  detectContainer,
  readContainer,
  type AppleSingleHeader,
  type ContainerKind,
} from './core/apple-single/apple-single.js';
export { fourCCToString, type AttributeSnapshot, type EntryAttributes } from './core/attributes/file-attribs.js';
export { generateMacZipName, isMacZipHeader } from './core/naming/mac-zip.js';
export { matchNapsName, parseNapsTag } from './core/naming/naps.js';
export {
  listImporterTags,
  parseImportOptions,
  resolveImporter,
  type Importer,
  type ImportSpec,
} from './core/import/index.js';
export * from './core/part-source/index.js';

// ============================================================================
// Types & Errors
// ============================================================================

export type { ExecutionContext, ExecutionOptions, OutputMode } from './types/execution-context.js';

export type {
  CommandResult,
  FilePart,
  ForkferryConfig,
  ForkferryDirectories,
  PreserveMode,
  SourceKind,
} from './types/index.js';
export { ForkferryError, ErrorCodes, PRESERVE_MODES } from './types/index.js';

export {
  ArchiveStateError,
  ConfigError,
  FileNotFoundError,
  FileSystemError,
  FormatError,
  StructureError,
  TransferCancelledError,
  TransferError,
  UserCancellationError,
  ValidationError,
  errorMessage,
  handleError,
} from './utils/errors.js';
export { logger } from './utils/logger.js';

// ============================================================================
// Pipelines
// ============================================================================

export {
  convertOptionsFromConfig,
  runConvertPipeline,
  type ConvertOptions,
  type ConvertResult,
} from './core/convert/convert-pipeline.js';
export { runScanPipeline } from './core/convert/scan-pipeline.js';
export { entryName, inspectContainerFile, type ContainerReport } from './core/inspect/inspect-container.js';
