import { ConfigErrorCode, createConfigError } from './errors/index.js';
import { isLogLevel, type LogLevel } from './logger.js';

/**
 * What the inherited-attribute walk does when a parent reference leads back
 * to a node it already visited.
 * - `error`: throw `R001`
 * - `stop`: log a warning and treat the attribute as not found
 */
export type ParentCyclePolicy = 'error' | 'stop';

export interface FormTreeConfig {
  logLevel: LogLevel;
  parentCycle: ParentCyclePolicy;
}

export const DEFAULT_CONFIG: FormTreeConfig = {
  logLevel: 'info',
  parentCycle: 'error',
};

export function isParentCyclePolicy(value: string): value is ParentCyclePolicy {
  return value === 'error' || value === 'stop';
}

/**
 * Reads configuration from environment variables.
 *
 * - `FORMTREE_LOG_LEVEL`: debug | info | warn | error
 * - `FORMTREE_PARENT_CYCLE`: error | stop
 *
 * Empty values fall back to the defaults.
 */
export function resolveFormTreeConfig(env: NodeJS.ProcessEnv = process.env): FormTreeConfig {
  const rawLevel = env.FORMTREE_LOG_LEVEL?.trim().toLowerCase();
  const rawCycle = env.FORMTREE_PARENT_CYCLE?.trim().toLowerCase();

  let logLevel = DEFAULT_CONFIG.logLevel;
  if (rawLevel) {
    if (!isLogLevel(rawLevel)) {
      throw createConfigError(
        ConfigErrorCode.INVALID_LOG_LEVEL,
        `Invalid log level "${env.FORMTREE_LOG_LEVEL}".`,
        { context: 'FORMTREE_LOG_LEVEL', suggestion: 'Use one of: debug, info, warn, error.' },
      );
    }
    logLevel = rawLevel;
  }

  let parentCycle = DEFAULT_CONFIG.parentCycle;
  if (rawCycle) {
    if (!isParentCyclePolicy(rawCycle)) {
      throw createConfigError(
        ConfigErrorCode.INVALID_PARENT_CYCLE_POLICY,
        `Invalid parent cycle policy "${env.FORMTREE_PARENT_CYCLE}".`,
        { context: 'FORMTREE_PARENT_CYCLE', suggestion: 'Use "error" or "stop".' },
      );
    }
    parentCycle = rawCycle;
  }

  return { logLevel, parentCycle };
}
