/**
 * AppConfig
 *
 * Centralized engine configuration, read from the validated environment.
 *
 * Usage:
 *   import { AppConfig } from '../config/AppConfig';
 *   if (AppConfig.verification.autoRun) { ... }
 */

import { env } from './env';

/**
 * Environment mode
 */
export type EnvMode = 'development' | 'production' | 'test';

/**
 * Console and file level; debug output (every subprocess record) only on request
 */
export function resolveLogLevel(configured: string | undefined): string {
  return configured || 'info';
}

export const AppConfig = {
  env: env.NODE_ENV satisfies EnvMode,

  isProduction: env.NODE_ENV === 'production',

  isTest: env.NODE_ENV === 'test',

  /**
   * LLM transport configuration
   */
  anthropic: {
    get apiKey(): string | undefined {
      return env.ANTHROPIC_API_KEY;
    },

    get isConfigured(): boolean {
      return !!env.ANTHROPIC_API_KEY;
    },

    get model(): string {
      return env.GRYFFIN_MODEL;
    },

    /**
     * Masked key for display
     */
    get maskedKey(): string {
      const key = env.ANTHROPIC_API_KEY;
      if (!key) return 'NOT_SET';
      if (key.length <= 8) return '****';
      return `${key.substring(0, 4)}****${key.substring(key.length - 4)}`;
    },
  },

  /**
   * Whole-project verification after the task list
   */
  verification: {
    /** Smoke-start detected dev servers (GRYFFIN_AUTO_RUN) */
    get autoRun(): boolean {
      return env.GRYFFIN_AUTO_RUN;
    },

    /** Leave healthy servers running in the background (GRYFFIN_PERSIST_SERVERS) */
    get persistServers(): boolean {
      return env.GRYFFIN_PERSIST_SERVERS;
    },
  },

  logging: {
    get level(): string {
      return resolveLogLevel(env.LOG_LEVEL);
    },

    /** Directory for JSON log files; console only when unset */
    get dir(): string | undefined {
      return env.LOG_DIR;
    },
  },
};

export default AppConfig;
