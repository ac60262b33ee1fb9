import fs from 'fs';
import type { Stats } from 'fs';
import path from 'path';
import chokidar, { type FSWatcher } from 'chokidar';
import { isHiddenName } from '../common/path';
import type {
  EntryChangeListener,
  EntryChangeReason,
  EntryHandle,
  EntryRecord,
  EntrySource,
} from '../types/entry';
import { createScopedLogger } from '../utils/logger';

type WatcherEvent = 'add' | 'addDir' | 'change' | 'unlink' | 'unlinkDir';

const WATCHER_REASONS: Record<WatcherEvent, EntryChangeReason> = {
  add: 'insert',
  addDir: 'insert',
  change: 'update',
  unlink: 'remove',
  unlinkDir: 'remove',
};

export interface FsEntrySourceOptions {
  /** Include dot-files in listings */
  showHidden?: boolean;
  /** Report external changes through chokidar */
  watch?: boolean;
}

export interface FsEntrySource extends EntrySource {
  close: () => Promise<void>;
}

const logger = createScopedLogger('entry-source');

const toIsoString = (date: Date) => date.toISOString();

const buildRecord = (entryPath: string, stats: Stats): EntryRecord => ({
  path: entryPath,
  rawName: path.basename(entryPath),
  isDirectory: stats.isDirectory(),
  size: stats.size,
  modifiedTime: toIsoString(stats.mtime),
});

const statQuietly = (entryPath: string): Stats | null => {
  try {
    return fs.statSync(entryPath);
  } catch {
    try {
      // Broken symlinks still show up in listings.
      return fs.lstatSync(entryPath);
    } catch {
      return null;
    }
  }
};

/**
 * Entry source over the local file system. Listings are read synchronously
 * and kept per directory until the next refresh of that directory.
 */
export const createFsEntrySource = (options: FsEntrySourceOptions = {}): FsEntrySource => {
  const showHidden = options.showHidden ?? false;
  const listings = new Map<string, EntryRecord[]>();
  const listeners = new Set<EntryChangeListener>();
  const watchCounts = new Map<string, number>();
  let watcher: FSWatcher | undefined;

  const readListing = (directoryPath: string): EntryRecord[] => {
    let names: string[];
    try {
      names = fs.readdirSync(directoryPath);
    } catch (error: unknown) {
      logger.warn(`Cannot list ${directoryPath}`, error);
      return [];
    }

    const records: EntryRecord[] = [];
    for (const name of names) {
      if (!showHidden && isHiddenName(name)) {
        continue;
      }
      const entryPath = path.join(directoryPath, name);
      const stats = statQuietly(entryPath);
      if (stats) {
        records.push(buildRecord(entryPath, stats));
      }
    }
    return records;
  };

  const listingFor = (directoryPath: string) => {
    const resolved = path.resolve(directoryPath);
    let listing = listings.get(resolved);
    if (!listing) {
      listing = readListing(resolved);
      listings.set(resolved, listing);
    }
    return listing;
  };

  const refresh = (directoryPath: string, reason: EntryChangeReason = 'refresh', entryPath?: string) => {
    const resolved = path.resolve(directoryPath);
    listings.set(resolved, readListing(resolved));
    const event = { reason, directoryPath: resolved, path: entryPath };
    listeners.forEach((listener) => listener(event));
  };

  const handleWatcherEvent = (event: WatcherEvent, rawPath: string) => {
    const absolutePath = path.resolve(rawPath);
    const directoryPath = path.dirname(absolutePath);
    if (!watchCounts.has(directoryPath)) {
      return;
    }
    refresh(directoryPath, WATCHER_REASONS[event], absolutePath);
  };

  const ensureWatcher = (directoryPath: string): FSWatcher => {
    if (watcher) {
      watcher.add(directoryPath);
      return watcher;
    }

    logger.info(`Starting file watcher at ${directoryPath}`);
    const created = chokidar.watch(directoryPath, {
      persistent: true,
      ignoreInitial: true,
      depth: 0,
      awaitWriteFinish: {
        stabilityThreshold: 100,
        pollInterval: 50,
      },
    });

    const events: WatcherEvent[] = ['add', 'addDir', 'change', 'unlink', 'unlinkDir'];
    for (const event of events) {
      created.on(event, (filePath: string) => {
        handleWatcherEvent(event, filePath);
      });
    }

    created.on('error', (error: unknown) => {
      logger.error('File watcher error', error);
    });

    watcher = created;
    return created;
  };

  return {
    children(directoryPath) {
      return listingFor(directoryPath).map((record) => ({ ...record }));
    },
    index(entryPath) {
      const resolved = path.resolve(entryPath);
      const directoryPath = path.dirname(resolved);
      const row = listingFor(directoryPath).findIndex((record) => record.path === resolved);
      return row < 0 ? null : { directoryPath, row };
    },
    filePath(handle: EntryHandle) {
      return listingFor(handle.directoryPath)[handle.row]?.path ?? null;
    },
    stat(entryPath) {
      const resolved = path.resolve(entryPath);
      const stats = statQuietly(resolved);
      return stats ? buildRecord(resolved, stats) : null;
    },
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    refresh(directoryPath, reason) {
      refresh(directoryPath, reason);
    },
    watch(directoryPath) {
      if (!options.watch) {
        return () => {};
      }
      const resolved = path.resolve(directoryPath);
      const count = watchCounts.get(resolved) ?? 0;
      watchCounts.set(resolved, count + 1);
      if (count === 0) {
        // Changes made while nobody watched were never seen.
        listings.delete(resolved);
        ensureWatcher(resolved);
      }

      let released = false;
      return () => {
        if (released) return;
        released = true;
        const remaining = (watchCounts.get(resolved) ?? 1) - 1;
        if (remaining > 0) {
          watchCounts.set(resolved, remaining);
          return;
        }
        watchCounts.delete(resolved);
        listings.delete(resolved);
        watcher?.unwatch(resolved);
      };
    },
    async close() {
      watchCounts.clear();
      listings.clear();
      if (watcher === undefined) {
        return;
      }
      logger.info('Stopping file watcher');
      const closing = watcher;
      watcher = undefined;
      await closing.close();
    },
  };
};
