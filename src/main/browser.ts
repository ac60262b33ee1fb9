import type { CorruptStoreError } from '../common/errors';
import type { Renamer } from '../common/nameCodec';
import { createPaneStore, type PaneStore } from '../renderer/fileView/paneStore';
import type { EntrySource } from '../types/entry';
import { configureLogging, createScopedLogger } from '../utils/logger';
import type { BrowserConfig } from './config';
import { createFsEntrySource } from './entrySource';
import { loadTagStore, type TagStore } from './tagStore';

const logger = createScopedLogger('browser');

export interface TwinPaneBrowserOptions {
  /** Replaces the file-system source, e.g. with an in-memory tree. */
  source?: EntrySource;
  renamer?: Renamer;
  historyCapacity?: number;
}

export interface TwinPaneBrowser {
  readonly config: BrowserConfig;
  readonly source: EntrySource;
  readonly tags: TagStore;
  /** Set when the tag file existed but could not be used. */
  readonly tagStoreWarning: CorruptStoreError | null;
  readonly left: PaneStore;
  readonly right: PaneStore;
  close: () => Promise<void>;
}

const openSource = (
  config: BrowserConfig,
  provided?: EntrySource,
): { source: EntrySource; closeSource: () => Promise<void> } => {
  if (provided) {
    return { source: provided, closeSource: async () => {} };
  }
  const fsSource = createFsEntrySource({ showHidden: config.showHidden, watch: config.watch });
  return { source: fsSource, closeSource: () => fsSource.close() };
};

export const createTwinPaneBrowser = (
  config: BrowserConfig,
  options: TwinPaneBrowserOptions = {},
): TwinPaneBrowser => {
  configureLogging(config.logFileLevel);

  const { store: tags, warning } = loadTagStore(config.tagStorePath);
  const { source, closeSource } = openSource(config, options.source);

  const services = { source, tags, renamer: options.renamer };
  const left = createPaneStore(services, {
    id: 'left',
    initialPath: config.rootPath,
    historyCapacity: options.historyCapacity,
  });
  const right = createPaneStore(services, {
    id: 'right',
    initialPath: config.secondaryPath,
    historyCapacity: options.historyCapacity,
  });

  logger.info(`Browsing ${config.rootPath} and ${config.secondaryPath}; tags in ${tags.storagePath}`);

  let closed = false;

  return {
    config,
    source,
    tags,
    tagStoreWarning: warning,
    left,
    right,
    async close() {
      if (closed) return;
      closed = true;
      left.dispose();
      right.dispose();
      await closeSource();
    },
  };
};
