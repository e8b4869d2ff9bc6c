/**
 * agent-coordinator - dependency-aware task scheduling for a pool of agents
 *
 * @packageDocumentation
 */

// Types
export * from './types.js';

// Errors
export * from './errors.js';

// Utils
export * from './utils/index.js';

// Coordination
export * from './coordination/index.js';

// Agents
export * from './agents/index.js';

// Integrations
export {
  HttpNotifier,
  NullNotifier,
  buildEvent,
  createNotifier,
  type HttpNotifierOptions,
  type ObservabilityEvent,
} from './integrations/observability.js';

// Monitoring
export {
  HealthMonitor,
  type HealthCheck,
  type HealthCheckResult,
  type HealthSource,
} from './monitoring/health.js';
