import * as dotenv from 'dotenv';
import { z } from 'zod';

export const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug', 'silly', 'off'] as const;

export type LogLevelSetting = (typeof LOG_LEVELS)[number];

export interface AnalyzerSettings {
  /** Console transport level; 'off' silences the console */
  logLevel: LogLevelSetting;
  /** File that receives a copy of every log line, null for no file output */
  logFile: string | null;
  /** Extra encounter catalog merged over the built-in one */
  encounterCatalogPath: string | null;
}

const LogLevelSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(LOG_LEVELS));

const OptionalPathSchema = z
  .string()
  .optional()
  .transform((value) => (value !== undefined && value.trim() !== '' ? value.trim() : null));

/**
 * Centralized configuration for the decoder and analyzers
 * Values come from the environment, with a `.env` file loaded on first use
 */
export class AnalyzerConfig {
  public static readonly DEFAULT_LOG_LEVEL: LogLevelSetting = 'warn';

  private static cached: AnalyzerSettings | null = null;

  /**
   * Read settings from an environment map
   * An invalid log level falls back to the default with a warning
   */
  public static fromEnvironment(env: NodeJS.ProcessEnv): AnalyzerSettings {
    let logLevel = this.DEFAULT_LOG_LEVEL;
    const rawLevel = env.EVTC_LOG_LEVEL;
    if (rawLevel !== undefined && rawLevel.trim() !== '') {
      const parsed = LogLevelSchema.safeParse(rawLevel);
      if (parsed.success) {
        logLevel = parsed.data;
      } else {
        console.warn('[AnalyzerConfig] Ignoring invalid EVTC_LOG_LEVEL', {
          value: rawLevel,
          allowed: LOG_LEVELS.join(', '),
        });
      }
    }

    return {
      logLevel,
      logFile: OptionalPathSchema.parse(env.EVTC_LOG_FILE),
      encounterCatalogPath: OptionalPathSchema.parse(env.EVTC_ENCOUNTER_CATALOG),
    };
  }

  /**
   * Settings for this process, loading `.env` once
   */
  public static load(): AnalyzerSettings {
    if (!this.cached) {
      dotenv.config();
      this.cached = this.fromEnvironment(process.env);
    }
    return this.cached;
  }

  /**
   * Forget cached settings so the next load() re-reads the environment
   */
  public static reset(): void {
    this.cached = null;
  }
}
