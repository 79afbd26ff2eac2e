// Core exports
export { AnalysisOrchestrator, type OrchestratorOptions, type FileSubmission } from './core/orchestrator.js';
export { InMemoryTaskStore, canTransition, type TaskStore, type TaskTransition, type TaskFilter, type NewTask } from './core/task-store.js';
export { createAnalysisService, type AnalysisService, type ServiceOverrides } from './core/service.js';
export { toEnvelope, toBatchEnvelope, type ResponseEnvelope, type BatchEnvelope } from './core/envelope.js';
export {
  isTerminal,
  TERMINAL_STATUSES,
  type AnalysisTask,
  type TaskStatus,
  type TaskMetadata,
  type BatchItem,
  type BatchResult,
} from './core/task.js';

// Errors
export {
  AnalysisError,
  UnsupportedContentTypeError,
  AnalyzerUnavailableError,
  AnalysisFailedError,
  EmptyContentError,
  TaskNotFoundError,
  InvalidTaskTransitionError,
  describeError,
  type ErrorKind,
} from './core/errors.js';

// Analyzers
export * from './analyzers/index.js';

// Content types
export {
  ContentTypeResolver,
  detectContentType,
  resolveAnalyzerKind,
  supportedContentTypes,
  DEFAULT_CONTENT_TYPE,
} from './utils/mime.js';

// Config exports
export {
  loadConfig,
  saveConfig,
  parseConfig,
  applyEnvOverrides,
  getAppPaths,
  DEFAULT_CONFIG,
  type Config,
  type AppPaths,
  type ExecutionMode,
} from './config.js';

export { logger, type Logger, type LogLevel } from './utils/logger.js';

export { VERSION } from './config.js';
