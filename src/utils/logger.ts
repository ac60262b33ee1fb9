import log from 'electron-log/node';
import type { LevelOption, LogFunctions } from 'electron-log';

const isTestRun = () =>
  process.env.JEST_WORKER_ID !== undefined || process.env.NODE_ENV === 'test';

if (isTestRun()) {
  log.transports.file.level = false;
  log.transports.console.level = false;
}

export type ScopedLogger = LogFunctions;

export const createScopedLogger = (scope: string): ScopedLogger => log.scope(scope);

/** Applies the configured level to the file transport. Ignored under Jest. */
export const configureLogging = (fileLevel: LevelOption) => {
  if (isTestRun()) return;
  log.transports.file.level = fileLevel;
};
