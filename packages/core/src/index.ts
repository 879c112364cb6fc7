// Pipeline
export {
  type NormalizeOptions,
  type NormalizeResult,
  normalizePrefix,
  assertPrefixAccessible,
  isNormalized,
} from './normalize.js'

// Package identity and target platforms
export {
  type PackageDescriptor,
  getArtifactBaseName,
  formatDescriptor,
} from './descriptor.js'
export {
  type TargetPlatform,
  type TargetOs,
  type TargetPlatformInfo,
  detectTargetPlatform,
  getTargetPlatformInfo,
  isTargetPlatform,
  SUPPORTED_TARGET_PLATFORMS,
  WINDOWS_EXECUTABLE_EXTENSIONS,
} from './platform.js'

// Stages
export {
  type ArtifactFormat,
  type Decompressor,
  type ExtractOptions,
  type ExtractArtifactOptions,
  type ExtractResult,
  type LocatedArtifact,
  ARTIFACT_FORMATS,
  decompressFile,
  extractArtifact,
  extractTar,
  extractTarGz,
  extractZip,
  findArtifact,
  listDirectory,
  makeExecutable,
} from './extract.js'
export { type FlattenResult, flattenLayout } from './flatten.js'
export {
  type ClassifiedEntry,
  type ClassifyOptions,
  type Placement,
  classifyEntries,
} from './classify.js'
export {
  type RenamedExecutable,
  type RenameOptions,
  type RenamePolicy,
  type ShortenOptions,
  DEFAULT_SEPARATORS,
  RENAME_POLICIES,
  isRenamePolicy,
  renameExecutables,
  shortenExecutableName,
} from './rename.js'

// Layout contract
export {
  type EntryKind,
  type TopLevelEntry,
  BIN_DIR,
  EXTRAS_DIR,
  METADATA_DIR,
  RESERVED_DIRECTORIES,
  isReservedDirectory,
  listTopLevel,
} from './layout.js'

// Executable detection
export {
  type BinaryKind,
  type ExecutableProbe,
  detectBinaryKind,
  isExecutableImage,
  extensionProbe,
  probeFor,
  readSignature,
  signatureProbe,
} from './probe.js'

// Batch runs
export {
  type BatchFailure,
  type BatchOptions,
  type BatchReport,
  type BatchUnit,
  DEFAULT_BATCH_LIMIT,
  DESCRIPTOR_FILE,
  PREFIX_DIR,
  appendStatusReport,
  discoverUnits,
  formatStatusReport,
  readDescriptor,
  runBatch,
} from './batch.js'

// Configuration, commands, errors, logging
export {
  type ConfigOverrides,
  type Env,
  type NormalizeConfig,
  loadConfig,
  splitList,
} from './config.js'
export {
  type CommandIo,
  type ParsedBatchArgs,
  type ParsedNormalizeArgs,
  BATCH_USAGE,
  NORMALIZE_USAGE,
  parseBatchArgs,
  parseNormalizeArgs,
  runBatchCommand,
  runNormalizeCommand,
} from './cli.js'
export {
  type DirectoryListingEntry,
  type NormalizeErrorCode,
  AlreadyNormalizedError,
  ConfigError,
  EXIT_CODES,
  ExtractionError,
  GENERIC_EXIT_CODE,
  LayoutConflictError,
  MissingInputArtifactError,
  NormalizeError,
  PrefixAccessError,
  exitCodeFor,
} from './errors.js'
export {
  type LogLevel,
  type Logger,
  type LoggerOptions,
  LOG_LEVELS,
  createLogger,
  silentLogger,
} from './log.js'
