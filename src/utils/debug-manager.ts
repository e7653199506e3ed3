import logger from './logger.js';
import type { Config } from '../types/wam.js';

export interface DebugCategories {
  protocol: boolean;
  transport: boolean;
  discovery: boolean;
  group: boolean;
  store: boolean;
}

export type DebugCategory = keyof DebugCategories;

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

function isDebugCategory(category: string, categories: DebugCategories): category is DebugCategory {
  return Object.keys(categories).includes(category);
}

function isLogLevel(level: string): level is LogLevel {
  return LOG_LEVELS.some(candidate => candidate === level);
}

export class DebugManager {
  private categories: DebugCategories;

  constructor(config?: Config) {
    // Initialize with defaults
    this.categories = {
      protocol: false,  // Encoded commands and raw replies
      transport: false, // HTTP request timing and failures
      discovery: true,  // SSDP search and hydration
      group: true,      // Grouping sequence steps
      store: false      // Speaker list reads and writes
    };

    if (config) {
      this.initFromConfig(config);
    }
  }

  private initFromConfig(config: Config): void {
    const level = config.logLevel.toLowerCase();
    if (isLogLevel(level)) {
      logger.level = level;
    }

    if (config.debugCategories && config.debugCategories.length > 0) {
      const categoriesToEnable = config.debugCategories.map(c => c.toLowerCase());

      // Special case: '*' or 'all' enables all categories
      if (categoriesToEnable.includes('*') || categoriesToEnable.includes('all')) {
        this.enableAll();
      } else {
        for (const category of categoriesToEnable) {
          if (isDebugCategory(category, this.categories)) {
            this.categories[category] = true;
          }
        }
      }
    }

    logger.debug('Debug configuration:', {
      logLevel: logger.level,
      categories: Object.entries(this.categories)
        .filter(([, enabled]) => enabled)
        .map(([category]) => category)
        .join(', ') || 'none'
    });
  }

  isEnabled(category: DebugCategory): boolean {
    return this.categories[category];
  }

  setLogLevel(level: string): void {
    if (!isLogLevel(level)) {
      throw new Error(`Invalid log level: ${level}`);
    }
    logger.level = level;
    logger.info(`Log level set to: ${level}`);
  }

  getCategories(): DebugCategories {
    return { ...this.categories };
  }

  enableAll(): void {
    for (const category of Object.keys(this.categories)) {
      if (isDebugCategory(category, this.categories)) {
        this.categories[category] = true;
      }
    }
  }

  // Conditional logging methods
  debug(category: DebugCategory, message: string, meta?: unknown): void {
    this.write('debug', category, message, meta);
  }

  info(category: DebugCategory, message: string, meta?: unknown): void {
    this.write('info', category, message, meta);
  }

  warn(category: DebugCategory, message: string, meta?: unknown): void {
    this.write('warn', category, message, meta);
  }

  error(category: DebugCategory, message: string, meta?: unknown): void {
    this.write('error', category, message, meta);
  }

  trace(category: DebugCategory, message: string, meta?: unknown): void {
    this.write('trace', category, message, meta);
  }

  private write(level: LogLevel, category: DebugCategory, message: string, meta?: unknown): void {
    if (!this.categories[category] || !this.shouldLog(level)) {
      return;
    }
    const logMeta = typeof meta === 'object' && meta !== null ? { ...meta, category } : { data: meta, category };
    logger[level](`[${category.toUpperCase()}] ${message}`, logMeta);
  }

  private shouldLog(level: LogLevel): boolean {
    const current = logger.level;
    const currentLevelIndex = isLogLevel(current) ? LOG_LEVELS.indexOf(current) : LOG_LEVELS.indexOf('info');
    return LOG_LEVELS.indexOf(level) <= currentLevelIndex;
  }
}

let debugManagerInstance: DebugManager | null = null;

export function initializeDebugManager(config: Config): DebugManager {
  debugManagerInstance = new DebugManager(config);
  return debugManagerInstance;
}

/**
 * Returns the configured instance, or one with default categories when
 * initializeDebugManager() has not run (library use, unit tests).
 */
export function getDebugManager(): DebugManager {
  if (!debugManagerInstance) {
    debugManagerInstance = new DebugManager();
  }
  return debugManagerInstance;
}

export const debugManager = {
  debug: (category: DebugCategory, message: string, meta?: unknown) => getDebugManager().debug(category, message, meta),
  info: (category: DebugCategory, message: string, meta?: unknown) => getDebugManager().info(category, message, meta),
  warn: (category: DebugCategory, message: string, meta?: unknown) => getDebugManager().warn(category, message, meta),
  error: (category: DebugCategory, message: string, meta?: unknown) => getDebugManager().error(category, message, meta),
  trace: (category: DebugCategory, message: string, meta?: unknown) => getDebugManager().trace(category, message, meta)
};
