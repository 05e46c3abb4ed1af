// Library entry point

export * from './context/index.js';
export * from './thread/index.js';
export * from './llm/types.js';
export * from './llm/transport.js';
export { ConversationEngine } from './agent/engine.js';
export type {
  AgentState,
  ContextTruncatedInfo,
  ConversationEngineEvents,
  ConversationEngineOptions,
  ToolResultInput,
  TurnCompleteInfo,
  TurnOutcome,
} from './agent/engine.js';
export * from './agent/prompt.js';
export { HandledError, ErrorHandler, handleError, getErrorMessage, causeChain } from './utils/error-handler.js';
export type { ErrorHandlingOptions } from './utils/error-handler.js';
export { Logger, LogLevel, logger, parseLogLevel } from './utils/logger.js';
export type { LoggerOptions, LogSink } from './utils/logger.js';
export { LockTimeoutError, ReadWriteLock, KeyedReadWriteLock } from './utils/rw-lock.js';
export { loadConfig, saveConfig, getConfigValue, setConfigValue, getDefaultConfig } from './utils/config.js';
export type { AppConfig } from './utils/config.js';
