export {
  loadConfig,
  parseConfig,
  resolveConfigPath,
  type Config,
  type ConfigFile,
  type ConfigOverrides,
} from "./config.js";
export {
  CsvFoldError,
  ConfigurationError,
  DataValidationError,
  FileProcessingError,
  LockTimeoutError,
  type ErrorKind,
  type Result,
} from "./errors.js";
export { parseCsv, serializeCsv, CsvParseError } from "./csv.js";
export { fileDigest, listSupportedHashes, type HashAlg } from "./hash.js";
export { scanStableFiles, type StabilityRecord } from "./stability.js";
export { validateFile, validateTable, decodeTable } from "./validate.js";
export { mergeTables, type MergePlan, type MergeStats } from "./merge.js";
export { FileLock, withLock, lockPathFor } from "./lock.js";
export { commitPlan, readMaster, writeFileAtomic } from "./persist.js";
export { archiveFile } from "./archive.js";
export { buildMetadata, readMetadata, writeMetadata, type Metadata } from "./metadata.js";
export {
  processFile,
  runPass,
  type FileOutcome,
  type PassReport,
  type ProgressEvent,
} from "./monitor.js";
export { startWatch, PassScheduler } from "./watch.js";
export {
  NullLogger,
  StructuredLogger,
  type Logger,
  type LogLevel,
} from "./logger.js";
export type { Cell, Row, Table } from "./table.js";
