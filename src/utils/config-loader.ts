import { readFileSync } from 'fs';
import * as dotenv from 'dotenv';
import logger, { loggerType } from './logger.js';
import type { Config } from '../types/wam.js';

/**
 * Default configuration values
 */
export const defaultConfig: Config = {
  logLevel: 'info',
  discoveryTimeout: 5000,
  httpTimeout: 5000,
  port: 55001,
  speakersFile: './speakers.json',
  arpTable: '/proc/net/arp'
};

const ENV_VARS = [
  'NODE_ENV', 'LOGGER', 'LOG_LEVEL', 'DEBUG_CATEGORIES',
  'WAM_INTERFACE', 'DISCOVERY_TIMEOUT', 'HTTP_TIMEOUT', 'WAM_PORT',
  'SPEAKERS_FILE', 'ARP_TABLE'
];

/**
 * Parse comma-separated environment variable into array
 */
function parseArrayEnv(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value.split(',').map(v => v.trim()).filter(v => v.length > 0);
}

/**
 * Parse a positive integer, ignoring anything that isn't one
 */
function parsePositiveInt(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = parseInt(value, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Result of configuration loading
 */
export interface ConfigLoadResult {
  config: Config;
  sources: string[];
  envOverrides: string[];
  // Backend picked from LOGGER and NODE_ENV when the logger module loaded
  loggerType: string;
}

export interface ConfigLoadOptions {
  settingsFile?: string;
  env?: NodeJS.ProcessEnv;
  // Load a .env file into process.env first
  loadDotenv?: boolean;
}

/**
 * Format the configuration loading info as a message
 */
export function formatConfigInfo(result: ConfigLoadResult): string {
  const loaded = result.envOverrides.length > 0
    ? `Configuration loaded from: ${result.sources.join(' → ')} (${result.envOverrides.join(', ')})`
    : `Configuration loaded from: ${result.sources.join(' → ')}`;
  return `${loaded}, logger: ${result.loggerType}`;
}

/**
 * Load configuration from multiple sources with precedence:
 * 1. Default values
 * 2. settings.json (if exists)
 * 3. Environment variables (highest priority)
 */
export function loadConfiguration(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const settingsFile = options.settingsFile ?? './settings.json';
  if (options.loadDotenv ?? true) {
    dotenv.config();
  }
  const env = options.env ?? process.env;

  let config: Config = { ...defaultConfig };
  const sources = ['defaults'];

  let settingsText: string | undefined;
  try {
    settingsText = readFileSync(settingsFile, 'utf-8');
  } catch {
    // settings.json is optional
    logger.debug(`No ${settingsFile} found, using defaults`);
  }
  if (settingsText !== undefined) {
    config = mergeSettings(config, JSON.parse(settingsText));
    sources.push(settingsFile);
  }

  if (env.LOG_LEVEL) config.logLevel = env.LOG_LEVEL;
  if (env.DEBUG_CATEGORIES) config.debugCategories = parseArrayEnv(env.DEBUG_CATEGORIES);
  if (env.WAM_INTERFACE) config.interfaceAddress = env.WAM_INTERFACE;
  config.discoveryTimeout = parsePositiveInt(env.DISCOVERY_TIMEOUT) ?? config.discoveryTimeout;
  config.httpTimeout = parsePositiveInt(env.HTTP_TIMEOUT) ?? config.httpTimeout;
  config.port = parsePositiveInt(env.WAM_PORT) ?? config.port;
  if (env.SPEAKERS_FILE) config.speakersFile = env.SPEAKERS_FILE;
  if (env.ARP_TABLE) config.arpTable = env.ARP_TABLE;

  const envOverrides = ENV_VARS.filter(name => env[name] !== undefined);
  if (envOverrides.length > 0) {
    sources.push('env vars');
  }

  return { config, sources, envOverrides, loggerType };
}

/**
 * Copy the recognised keys of a parsed settings file over the config
 */
function mergeSettings(config: Config, settings: unknown): Config {
  if (!isObject(settings)) {
    return config;
  }
  const merged: Config = { ...config };
  if (typeof settings.logLevel === 'string') merged.logLevel = settings.logLevel;
  if (Array.isArray(settings.debugCategories)) {
    merged.debugCategories = settings.debugCategories.filter((c): c is string => typeof c === 'string');
  }
  if (typeof settings.interfaceAddress === 'string') merged.interfaceAddress = settings.interfaceAddress;
  if (typeof settings.discoveryTimeout === 'number') merged.discoveryTimeout = settings.discoveryTimeout;
  if (typeof settings.httpTimeout === 'number') merged.httpTimeout = settings.httpTimeout;
  if (typeof settings.port === 'number') merged.port = settings.port;
  if (typeof settings.speakersFile === 'string') merged.speakersFile = settings.speakersFile;
  if (typeof settings.arpTable === 'string') merged.arpTable = settings.arpTable;
  return merged;
}

/**
 * Check if value is an object
 */
function isObject(item: unknown): item is Record<string, unknown> {
  return item !== null && typeof item === 'object' && !Array.isArray(item);
}
