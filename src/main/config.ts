import os from 'os';
import path from 'path';
import type { LevelOption, LogLevel } from 'electron-log';
import { createScopedLogger } from '../utils/logger';
import { DEFAULT_TAGS_FILE } from './tagStore';

export interface BrowserConfig {
  rootPath: string;
  secondaryPath: string;
  tagStorePath: string;
  showHidden: boolean;
  watch: boolean;
  logFileLevel: LevelOption;
}

const logger = createScopedLogger('browser-config');

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'];

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

const readString = (value: string | undefined) => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  const normalised = readString(value)?.toLowerCase();
  if (normalised === undefined) return fallback;
  if (TRUE_VALUES.includes(normalised)) return true;
  if (FALSE_VALUES.includes(normalised)) return false;
  logger.warn(`Ignoring unrecognised boolean value "${value}"; using ${fallback}.`);
  return fallback;
};

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

export const parseLogLevel = (value: string | undefined): LevelOption => {
  const normalised = readString(value)?.toLowerCase();
  if (normalised === undefined) return 'info';
  if (FALSE_VALUES.includes(normalised)) return false;
  if (isLogLevel(normalised)) return normalised;
  logger.warn(`Ignoring unknown log level "${value}"; using info.`);
  return 'info';
};

/**
 * Reads the browser settings from `env`. Explicit `overrides` win over the
 * environment; relative paths resolve against the working directory.
 */
export const resolveBrowserConfig = (
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<BrowserConfig> = {},
): BrowserConfig => {
  const rootPath = path.resolve(overrides.rootPath ?? readString(env.BROWSER_ROOT) ?? os.homedir());
  const secondaryPath = path.resolve(
    overrides.secondaryPath ?? readString(env.BROWSER_SECONDARY_ROOT) ?? rootPath,
  );
  const tagStorePath = path.resolve(
    overrides.tagStorePath ??
      readString(env.BROWSER_TAGS_FILE) ??
      path.join(rootPath, DEFAULT_TAGS_FILE),
  );

  return {
    rootPath,
    secondaryPath,
    tagStorePath,
    showHidden: overrides.showHidden ?? parseBoolean(env.BROWSER_SHOW_HIDDEN, false),
    watch: overrides.watch ?? parseBoolean(env.BROWSER_WATCH, true),
    logFileLevel: overrides.logFileLevel ?? parseLogLevel(env.BROWSER_LOG_LEVEL),
  };
};
