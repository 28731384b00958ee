// Platform detection
export {
  type Arch,
  detectArch,
  SUPPORTED_ARCHES,
} from './platform.js'

// Download utilities
export {
  type DownloadOptions,
  type DownloadResult,
  downloadFile,
  formatBytes,
  createProgressLogger,
} from './download.js'

// Checksums
export {
  type ChecksumAlgorithm,
  type ChecksumEntry,
  type LineRange,
  CHECKSUM_SUFFIXES,
  parseChecksumLine,
  parseChecksumManifest,
  hashFile,
  hashContent,
  hashFileLines,
} from './checksum.js'

// Extract utilities
export {
  type ExtractOptions,
  extractTarGz,
  makeExecutable,
  isTarGz,
} from './extract.js'

// Temporary directories
export {
  type TempDirOptions,
  createTempDir,
  removeDir,
  withTempDir,
} from './tempdir.js'

// Subprocesses
export {
  type RunOptions,
  type CommandResult,
  type CommandRunner,
  runCommand,
} from './process.js'

// Logging
export {
  type LogLevel,
  type LogSink,
  type LoggerOptions,
  Logger,
  createLogger,
  shouldUseColor,
} from './logger.js'
