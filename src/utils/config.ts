/**
 * Configuration management for the coordinator
 */

import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { z } from 'zod';
import type { CoordinatorConfig } from '../types.js';
import { logger } from './logger.js';

const ObservabilityConfigSchema = z.object({
  enabled: z.boolean().default(true),
  sourceApp: z.string().min(1).default('multi-agent-coordinator'),
  sessionId: z.string().min(1).default('coordinator'),
  timeoutMs: z.number().int().min(100).max(60000).default(5000),
  maxInFlight: z.number().int().min(1).max(100).default(10),
  maxQueued: z.number().int().min(0).max(100000).default(1000),
  failureThreshold: z.number().int().min(1).max(100).default(5),
  cooldownMs: z.number().int().min(1000).max(3600000).default(60000),
});

const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  format: z.enum(['json', 'pretty']).default('pretty'),
});

const ConfigSchema = z.object({
  version: z.string().default('1.0.0'),
  maxConcurrentAgents: z.number().int().min(1).max(1000).default(5),
  taskTimeoutMinutes: z.number().positive().max(7 * 24 * 60).default(60),
  healthCheckInterval: z.number().positive().max(3600).default(30),
  observabilityServer: z.string().url().default('http://localhost:4000'),
  maxTaskRetries: z.number().int().min(1).max(100).default(3),
  messageRetentionHours: z.number().positive().max(24 * 365).default(24),
  autoAssignTasks: z.boolean().default(true),
  agentRestartOnFailure: z.boolean().default(true),
  observability: ObservabilityConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export const CONFIG_FILE_NAME = 'coordinator.config.json';

/**
 * Interpolate environment variables in config values
 */
function interpolateEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
      return process.env[envVar] ?? '';
    });
  }
  if (Array.isArray(obj)) {
    return obj.map(interpolateEnvVars);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = interpolateEnvVars(value);
    }
    return result;
  }
  return obj;
}

/**
 * Find config file by walking up directories
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = startDir;

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

/**
 * Load and validate configuration
 */
export function loadConfig(configPath?: string): CoordinatorConfig {
  const path = configPath ?? findConfigFile();

  let rawConfig: unknown = {};

  if (path && existsSync(path)) {
    try {
      rawConfig = JSON.parse(readFileSync(path, 'utf-8'));
      logger.debug('Loaded config from file', { path });
    } catch (error) {
      logger.warn('Failed to parse config file, using defaults', {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  } else {
    logger.debug('No config file found, using defaults');
  }

  const result = ConfigSchema.safeParse(interpolateEnvVars(rawConfig));

  if (!result.success) {
    logger.warn('Config validation errors, using defaults', {
      errors: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
    });
    return getDefaultConfig();
  }

  const config: CoordinatorConfig = result.data;
  return config;
}

/**
 * Get default config
 */
export function getDefaultConfig(): CoordinatorConfig {
  return ConfigSchema.parse({});
}

/**
 * Save configuration to file
 */
export function saveConfig(config: CoordinatorConfig, configPath?: string): void {
  const path = configPath ?? join(process.cwd(), CONFIG_FILE_NAME);

  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  writeFileSync(path, JSON.stringify(config, null, 2));
  logger.info('Configuration saved', { path });
}

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): { valid: boolean; errors?: string[] } {
  const result = ConfigSchema.safeParse(config);

  if (result.success) {
    return { valid: true };
  }

  return {
    valid: false,
    errors: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
  };
}

/**
 * Apply the logging section to the root logger
 */
export function applyLoggingConfig(config: CoordinatorConfig): void {
  logger.setLevel(config.logging.level);
  logger.setFormat(config.logging.format);
}

let cachedConfig: CoordinatorConfig | null = null;

/**
 * Get the current configuration (cached)
 */
export function getConfig(): CoordinatorConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Reset the cached configuration
 */
export function resetConfig(): void {
  cachedConfig = null;
}
