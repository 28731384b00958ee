// Configuration
export {
  type BuildtoolsVariant,
  type InstallerOptions,
  DEFAULT_BASE_URL,
  DEFAULT_BUILD_DATE,
  DEFAULT_INSTALL_ROOT,
  DEFAULT_INSTALLER_VERSION,
  DEFAULT_RELEASE,
  defaultInstallerOptions,
  environmentSetupScript,
  getDefaultBaseUrl,
  smokeTestTool,
} from './options.js'

// URL resolution
export {
  type ResolvedTarget,
  buildtoolsFilename,
  joinUrl,
  parseMilestone,
  resolveTarget,
} from './resolve.js'

// Pipeline
export {
  type ChecksumManifest,
  type FetchedFiles,
  type InstallerDeps,
  SUCCESS_MESSAGE,
  fetchStage,
  installStage,
  runInstaller,
  smokeTestStage,
  verifyStage,
} from './pipeline.js'

// Environment setup scripts
export {
  type EnvironmentAssignment,
  parseEnvironmentSetup,
  readEnvironmentSetup,
} from './environment.js'

// Errors
export {
  type ErrorKind,
  type StageResult,
  BuildtoolsError,
  describeError,
} from './errors.js'

// CLI
export {
  type ParsedArgs,
  createBundleDownloader,
  createProgram,
  main,
  parseInstallerArgs,
} from './cli.js'
