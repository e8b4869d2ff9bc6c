/**
 * Utility exports
 */

export { logger, createLogger, initErrorTracking, Logger, type LogLevel, type LogFormat } from './logger.js';
export {
  CONFIG_FILE_NAME,
  loadConfig,
  getConfig,
  getDefaultConfig,
  saveConfig,
  validateConfig,
  applyLoggingConfig,
  resetConfig,
} from './config.js';
export * from './validation.js';
export { Semaphore, SemaphoreFullError, type SemaphoreOptions } from './semaphore.js';
export { CircuitBreaker, CircuitOpenError, type CircuitState, type CircuitBreakerOptions } from './circuit-breaker.js';
