/**
 * delphix-pipeline-steps - Delphix engine and DCT build steps
 *
 * Pipeline build steps for Delphix with:
 * - Self Service bookmark and container operations
 * - VDB provisioning and deletion through DCT
 * - Job and action polling
 * - Session-cookie login against the engine API
 *
 * @module delphix-pipeline-steps
 */

// Types - Status
export type { DctJobStatus } from './types/status.js';

export {
  JobState,
  ActionState,
  DCT_JOB_STATUSES,
  jobStateFromString,
  actionStateFromString,
  isJobRunning,
  isActionRunning,
  isActionCompleted,
  isDctJobRunning,
} from './types/status.js';

// Types - Resources
export type {
  EngineResponse,
  SelfServiceBookmark,
  SelfServiceContainer,
  JobStatus,
  ActionStatus,
} from './types/resources.js';

export {
  parseEngineResponse,
  parseWith,
  parseSelfServiceBookmark,
  parseSelfServiceContainer,
  parseJobStatus,
  parseActionStatus,
  initialJobStatus,
} from './types/resources.js';

// Errors
export {
  DelphixErrorKind,
  DelphixError,
  isDelphixError,
} from './types/errors.js';

// Config
export type {
  ApiVersion,
  EngineDefinition,
  PluginConfiguration,
  ConfigFile,
} from './config.js';

export {
  DEFAULT_TIMEOUT,
  DEFAULT_JOB_POLL_INTERVAL,
  DEFAULT_DCT_POLL_INTERVAL,
  DEFAULT_USER_AGENT,
  DEFAULT_API_VERSION,
  PluginConfigurationBuilder,
  createConfigFromEnv,
  createConfigFromObject,
  createDefaultConfig,
  findEngine,
  loadConfigFile,
  validateConfig,
} from './config.js';

// Auth
export type { EngineCredentials, CredentialProvider, CredentialStore } from './auth/index.js';

export {
  SecretString,
  StaticCredentialProvider,
  EnvCredentialProvider,
  StaticCredentialStore,
  EnvCredentialStore,
} from './auth/index.js';

// Logging
export type { Logger, LogEntry, ConsoleLoggerOptions } from './observability/logging.js';

export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
} from './observability/logging.js';

// Engine client
export type {
  EngineClientConfig,
  HttpMethod,
  RequestOptions,
  HttpResponse,
  HttpTransportOptions,
} from './client/index.js';

export {
  API_ROOT,
  EngineClient,
  createEngineClient,
  HttpTransport,
  SessionManager,
  normalizeBaseUrl,
  extractErrorMessage,
} from './client/index.js';

// Engine services
export {
  BookmarkService,
  ContainerService,
  JobService,
  BOOKMARK_PATH,
  CONTAINER_PATH,
  JOB_PATH,
  ACTION_PATH,
  createServices,
} from './services/index.js';
export type { EngineServices, BookmarkCreateParameters } from './services/index.js';

// DCT
export * from './dct/index.js';

// Monitoring
export * from './monitoring/index.js';

// Build steps
export * from './steps/index.js';
