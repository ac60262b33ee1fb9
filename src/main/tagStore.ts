import fs from 'fs';
import path from 'path';
import { CorruptStoreError, PersistFailureError, describeError, errorCodeOf } from '../common/errors';
import { isWithinPath, normaliseStorePath } from '../common/path';
import type {
  TagChangeListener,
  TagDocument,
  TagEditor,
  TagSet,
  TagWriteResult,
} from '../types/tags';
import { createScopedLogger } from '../utils/logger';
import { logTagWrite } from '../utils/viewLogger';

const logger = createScopedLogger('tag-store');

/** File name used when a tag store lives next to the browsed root. */
export const DEFAULT_TAGS_FILE = '.tags.json';

export interface TagStore extends TagEditor {
  readonly storagePath: string;
  set: (entryPath: string, tags: readonly string[]) => TagWriteResult;
  paths: () => string[];
  snapshot: () => TagDocument;
}

export interface TagStoreLoadResult {
  store: TagStore;
  warning: CorruptStoreError | null;
}

export interface TagStoreOptions {
  platform?: NodeJS.Platform;
}

const dedupe = (tags: readonly string[]) =>
  tags.reduce<string[]>((unique, tag) => {
    if (tag && !unique.includes(tag)) unique.push(tag);
    return unique;
  }, []);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

const parseDocument = (
  raw: string,
  storagePath: string,
  platform: NodeJS.Platform,
): Map<string, string[]> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    throw new CorruptStoreError(
      storagePath,
      `Tag store ${storagePath} is not valid JSON: ${describeError(error)}`,
      error,
    );
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new CorruptStoreError(storagePath, `Tag store ${storagePath} must contain a JSON object`);
  }

  const tags = new Map<string, string[]>();
  for (const [key, value] of Object.entries(parsed)) {
    if (!isStringArray(value)) {
      throw new CorruptStoreError(
        storagePath,
        `Tag store ${storagePath} has a non-string-array value for ${key}`,
      );
    }
    const normalised = normaliseStorePath(key, platform);
    const merged = dedupe([...(tags.get(normalised) ?? []), ...value]);
    if (merged.length) {
      tags.set(normalised, merged);
    }
  }
  return tags;
};

const readDocument = (
  storagePath: string,
  platform: NodeJS.Platform,
): { tags: Map<string, string[]>; warning: CorruptStoreError | null } => {
  let raw: string;
  try {
    raw = fs.readFileSync(storagePath, 'utf8');
  } catch (error: unknown) {
    if (errorCodeOf(error) === 'ENOENT') {
      return { tags: new Map(), warning: null };
    }
    return {
      tags: new Map(),
      warning: new CorruptStoreError(
        storagePath,
        `Tag store ${storagePath} could not be read: ${describeError(error)}`,
        error,
      ),
    };
  }

  try {
    return { tags: parseDocument(raw, storagePath, platform), warning: null };
  } catch (error: unknown) {
    if (error instanceof CorruptStoreError) {
      return { tags: new Map(), warning: error };
    }
    throw error;
  }
};

/**
 * Loads the tag document at `storagePath`. A missing file is an empty store; a
 * malformed one is an empty store plus a warning.
 */
export const loadTagStore = (
  storagePath: string,
  options: TagStoreOptions = {},
): TagStoreLoadResult => {
  const platform = options.platform ?? process.platform;
  const resolvedStorage = path.resolve(storagePath);
  const { tags, warning } = readDocument(resolvedStorage, platform);
  const listeners = new Set<TagChangeListener>();

  if (warning) {
    logger.warn(`${warning.message}; starting with an empty tag store.`);
  }

  const toDocument = (): TagDocument => {
    const document: TagDocument = {};
    tags.forEach((value, key) => {
      document[key] = [...value];
    });
    return document;
  };

  // Written to a sibling file, then renamed over the target.
  const persist = (): PersistFailureError | null => {
    const tempPath = `${resolvedStorage}.${process.pid}.tmp`;
    try {
      fs.mkdirSync(path.dirname(resolvedStorage), { recursive: true });
      try {
        fs.writeFileSync(tempPath, JSON.stringify(toDocument(), null, 2), 'utf8');
        fs.renameSync(tempPath, resolvedStorage);
      } catch (error: unknown) {
        fs.rmSync(tempPath, { force: true });
        throw error;
      }
      return null;
    } catch (error: unknown) {
      const failure = new PersistFailureError(
        resolvedStorage,
        `Failed to write tag store ${resolvedStorage}: ${describeError(error)}`,
        error,
      );
      logger.error(failure.message);
      return failure;
    }
  };

  const current = (key: string): TagSet => [...(tags.get(key) ?? [])];

  const notify = (key: string) => {
    const event = { path: key, tags: current(key) };
    listeners.forEach((listener) => listener(event));
  };

  // In-memory state is already updated when this runs; a failed write only
  // loses durability.
  const commit = (keys: string[]): TagWriteResult => {
    const error = persist();
    const primary = keys[keys.length - 1];
    keys.forEach((key) => {
      logTagWrite({ path: key, tags: current(key), persisted: error === null });
      notify(key);
    });
    return error ? { ok: false, tags: current(primary), error } : { ok: true, tags: current(primary) };
  };

  const assign = (key: string, next: readonly string[]) => {
    const unique = dedupe(next);
    if (unique.length) {
      tags.set(key, unique);
    } else {
      tags.delete(key);
    }
  };

  const store: TagStore = {
    storagePath: resolvedStorage,
    get(entryPath) {
      return current(normaliseStorePath(entryPath, platform));
    },
    add(entryPath, tag) {
      const key = normaliseStorePath(entryPath, platform);
      const existing = tags.get(key) ?? [];
      if (!tag || existing.includes(tag)) {
        return { ok: true, tags: current(key) };
      }
      assign(key, [...existing, tag]);
      return commit([key]);
    },
    remove(entryPath, tag) {
      const key = normaliseStorePath(entryPath, platform);
      const existing = tags.get(key);
      if (!existing || !existing.includes(tag)) {
        return { ok: true, tags: current(key) };
      }
      assign(key, existing.filter((candidate) => candidate !== tag));
      return commit([key]);
    },
    set(entryPath, next) {
      const key = normaliseStorePath(entryPath, platform);
      assign(key, next);
      return commit([key]);
    },
    clear(entryPath) {
      return store.set(entryPath, []);
    },
    move(fromPath, toPath) {
      const fromKey = normaliseStorePath(fromPath, platform);
      const toKey = normaliseStorePath(toPath, platform);
      const movedKeys = [...tags.keys()].filter((key) => isWithinPath(fromKey, key, platform));
      if (!movedKeys.length || fromKey === toKey) {
        return { ok: true, tags: current(toKey) };
      }

      // A renamed directory takes the tags of everything beneath it along.
      const targetKeys = movedKeys.map((key) => `${toKey}${key.slice(fromKey.length)}`);
      const moving = movedKeys.map((key) => tags.get(key) ?? []);
      movedKeys.forEach((key) => tags.delete(key));
      targetKeys.forEach((key, index) => {
        assign(key, [...(tags.get(key) ?? []), ...moving[index]]);
      });
      return commit([...movedKeys, ...targetKeys.filter((key) => key !== toKey), toKey]);
    },
    paths() {
      return [...tags.keys()];
    },
    snapshot: toDocument,
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };

  return { store, warning };
};
