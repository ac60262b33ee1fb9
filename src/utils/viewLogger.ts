import util from 'util';
import { bold, cyan, dim, green, magenta, red, yellow } from 'colorette';

const MAX_SAMPLE_NAMES = 5;
const MAX_TEXT_LENGTH = 120;

const numberFormatter = new Intl.NumberFormat('en-US');

const coerceBoolean = (value: unknown): boolean => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalised = value.trim().toLowerCase();
    return ['1', 'true', 't', 'yes', 'y', 'on'].includes(normalised);
  }
  return false;
};

const isProductionBuild = () => {
  if (process.env.DEBUG_PROD === 'true') {
    return false;
  }
  return process.env.NODE_ENV === 'production';
};

const isVerboseEnabled = () =>
  coerceBoolean(process.env.BROWSER_LOG_VERBOSE) && !isProductionBuild();

const shouldLogErrors = () => !isProductionBuild();

const timestamp = () => dim(new Date().toISOString());

const indentBlock = (value: string, indent = '   ') =>
  value.split('\n').map((line) => `${indent}${line}`).join('\n');

const formatDuration = (durationMs: number) => `${durationMs.toFixed(1)} ms`;

const formatNumber = (value: number | undefined) =>
  typeof value === 'number' && Number.isFinite(value) ? numberFormatter.format(value) : '—';

const truncateText = (text: string) =>
  text.length <= MAX_TEXT_LENGTH ? text : `${text.slice(0, MAX_TEXT_LENGTH - 1)}…`;

const formatJson = (value: unknown) =>
  util.inspect(value, { colors: true, depth: 4, breakLength: 80, maxArrayLength: 20 });

const samplePreview = (names: readonly string[]) => {
  const preview = names.slice(0, MAX_SAMPLE_NAMES).join(', ');
  if (names.length > MAX_SAMPLE_NAMES) {
    return `${preview} … +${formatNumber(names.length - MAX_SAMPLE_NAMES)} more`;
  }
  return preview;
};

const emit = (header: string, details: string[] = []) => {
  console.log(`${timestamp()} ${header}`);
  details.forEach((detail) => {
    detail.split('\n').forEach((line) => console.log(`   ${line}`));
  });
};

const emitError = (header: string, details: string[] = []) => {
  const lines = [`${timestamp()} ${header}`];
  details.forEach((detail) => {
    lines.push(...detail.split('\n').map((line) => `   ${line}`));
  });
  lines.forEach((line) => console.error(line));
};

export interface ResortLogInfo {
  directoryPath: string;
  rowCount: number;
  durationMs: number;
  orderedNames: readonly string[];
}

export interface FilterLogInfo {
  searchText: string;
  rootPath: string;
  visibleRows: number;
  totalRows: number;
  tagLookups: number;
}

export interface ToggleLogInfo {
  fromPath: string;
  toPath: string;
  disabled: boolean;
}

export interface TagWriteLogInfo {
  path: string;
  tags: readonly string[];
  persisted: boolean;
}

export interface ViewErrorLogInfo {
  stage?: 'toggle' | 'tags' | 'navigate' | 'watch' | 'unknown';
  path?: string;
  pane?: string;
  details?: unknown;
}

export const logResort = (info: ResortLogInfo) => {
  if (!isVerboseEnabled()) return;
  const header = `${cyan('[Sort]')} ${green('Re-sorted')} ${bold(info.directoryPath)} ${dim(`in ${formatDuration(info.durationMs)}`)}`;
  const details = [`Rows: ${formatNumber(info.rowCount)}`];
  if (info.orderedNames.length) {
    details.push(`Order: ${samplePreview(info.orderedNames)}`);
  }
  emit(header, details);
};

export const logFilterRebuild = (info: FilterLogInfo) => {
  if (!isVerboseEnabled()) return;
  const query = info.searchText ? `"${truncateText(info.searchText)}"` : dim('(empty)');
  const header = `${magenta('[Filter]')} ${green('Rebuilt rows')} for ${query}`;
  emit(header, [
    `Root: ${info.rootPath || '—'}`,
    `Visible: ${formatNumber(info.visibleRows)} / ${formatNumber(info.totalRows)}`,
    `Tag lookups: ${formatNumber(info.tagLookups)}`,
  ]);
};

export const logToggle = (info: ToggleLogInfo) => {
  if (!isVerboseEnabled()) return;
  const state = info.disabled ? yellow('disabled') : green('enabled');
  emit(`${cyan('[Toggle]')} ${bold(info.toPath)} is now ${state}`, [`Renamed from: ${info.fromPath}`]);
};

export const logTagWrite = (info: TagWriteLogInfo) => {
  if (!isVerboseEnabled()) return;
  const status = info.persisted ? green('persisted') : yellow('memory only');
  emit(`${magenta('[Tags]')} ${bold(info.path)} ${dim(`(${status})`)}`, [
    `Tags: ${info.tags.length ? info.tags.join(', ') : '—'}`,
  ]);
};

export const logError = (error: unknown, info: ViewErrorLogInfo = {}) => {
  if (!shouldLogErrors()) return;
  const err = error instanceof Error ? error : new Error(typeof error === 'string' ? error : 'Unknown view error');
  const header = `${red('[View]')} ${red('Operation failed')} ${info.pane ? dim(`(${info.pane} pane)`) : ''}`.trim();
  const details: string[] = [];
  if (info.stage) {
    details.push(`Stage: ${info.stage}`);
  }
  if (info.path) {
    details.push(`Path: ${info.path}`);
  }
  if (info.details !== undefined) {
    details.push('Details:');
    details.push(indentBlock(formatJson(info.details)));
  }
  details.push(err.stack ?? err.message);
  emitError(header, details);
};

export const viewLogger = {
  logResort,
  logFilterRebuild,
  logToggle,
  logTagWrite,
  logError,
};
