import path from 'path';
import type {
  EntryChangeListener,
  EntryChangeReason,
  EntryHandle,
  EntryRecord,
  EntrySource,
} from '../types/entry';
import type { Renamer } from './nameCodec';

export interface MemoryNodeInput {
  name: string;
  /** Present (even empty) for directories */
  children?: MemoryNodeInput[];
  size?: number;
  modifiedTime?: string;
}

export interface MemoryEntrySource extends EntrySource, Renamer {
  readonly rootPath: string;
  /** Inserts a node under `parentPath` and reports it as an insert. */
  add: (parentPath: string, node: MemoryNodeInput) => string;
  /** Removes a node (and its subtree) and reports it as a removal. */
  remove: (entryPath: string) => void;
}

const DEFAULT_MODIFIED = '2024-01-01T00:00:00.000Z';

/**
 * Entry source backed by plain maps. Children keep insertion order, which is
 * deliberately not the display order.
 */
export const createMemoryEntrySource = (
  rootPath: string,
  nodes: MemoryNodeInput[] = [],
): MemoryEntrySource => {
  const root = path.resolve(rootPath);
  const listings = new Map<string, EntryRecord[]>([[root, []]]);
  const listeners = new Set<EntryChangeListener>();

  const emit = (reason: EntryChangeReason, directoryPath: string, entryPath?: string) => {
    listeners.forEach((listener) => listener({ reason, directoryPath, path: entryPath }));
  };

  const insert = (parentPath: string, node: MemoryNodeInput): string => {
    const listing = listings.get(parentPath);
    if (!listing) throw new Error(`Directory ${parentPath} not found`);
    const entryPath = path.join(parentPath, node.name);
    if (listing.some((record) => record.path === entryPath)) {
      throw new Error(`Name ${node.name} already exists in ${parentPath}`);
    }
    const isDirectory = node.children !== undefined;
    listing.push({
      path: entryPath,
      rawName: node.name,
      isDirectory,
      size: node.size ?? 0,
      modifiedTime: node.modifiedTime ?? DEFAULT_MODIFIED,
    });
    if (isDirectory) {
      listings.set(entryPath, []);
      node.children?.forEach((child) => insert(entryPath, child));
    }
    return entryPath;
  };

  nodes.forEach((node) => insert(root, node));

  const findRecord = (entryPath: string) => {
    const resolved = path.resolve(entryPath);
    const listing = listings.get(path.dirname(resolved));
    const row = listing ? listing.findIndex((record) => record.path === resolved) : -1;
    return { resolved, listing, row };
  };

  const rekeySubtree = (fromPath: string, toPath: string) => {
    const prefix = `${fromPath}${path.sep}`;
    const moved = [...listings.entries()].filter(
      ([key]) => key === fromPath || key.startsWith(prefix),
    );
    moved.forEach(([key, listing]) => {
      listings.delete(key);
      const nextKey = `${toPath}${key.slice(fromPath.length)}`;
      listings.set(
        nextKey,
        listing.map((record) => ({
          ...record,
          path: path.join(nextKey, record.rawName),
        })),
      );
    });
  };

  return {
    rootPath: root,
    children(directoryPath) {
      return (listings.get(path.resolve(directoryPath)) ?? []).map((record) => ({ ...record }));
    },
    index(entryPath) {
      const { resolved, row } = findRecord(entryPath);
      return row < 0 ? null : { directoryPath: path.dirname(resolved), row };
    },
    filePath(handle: EntryHandle) {
      return listings.get(handle.directoryPath)?.[handle.row]?.path ?? null;
    },
    stat(entryPath) {
      const { resolved, listing, row } = findRecord(entryPath);
      if (listing && row >= 0) return { ...listing[row] };
      if (resolved === root) {
        return {
          path: root,
          rawName: path.basename(root),
          isDirectory: true,
          size: 0,
          modifiedTime: DEFAULT_MODIFIED,
        };
      }
      return null;
    },
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    refresh(directoryPath, reason = 'refresh') {
      emit(reason, path.resolve(directoryPath));
    },
    watch() {
      return () => {};
    },
    exists(targetPath) {
      const resolved = path.resolve(targetPath);
      return resolved === root || findRecord(resolved).row >= 0;
    },
    rename(fromPath, toPath) {
      const { resolved, listing, row } = findRecord(fromPath);
      if (!listing || row < 0) {
        throw Object.assign(new Error(`ENOENT: no such file or directory, rename '${resolved}'`), {
          code: 'ENOENT',
        });
      }
      const target = path.resolve(toPath);
      const record = listing[row];
      listing[row] = { ...record, path: target, rawName: path.basename(target) };
      if (record.isDirectory) {
        rekeySubtree(resolved, target);
      }
    },
    add(parentPath, node) {
      const parent = path.resolve(parentPath);
      const entryPath = insert(parent, node);
      emit('insert', parent, entryPath);
      return entryPath;
    },
    remove(entryPath) {
      const { resolved, listing, row } = findRecord(entryPath);
      if (!listing || row < 0) return;
      const [record] = listing.splice(row, 1);
      if (record.isDirectory) {
        const prefix = `${resolved}${path.sep}`;
        [...listings.keys()]
          .filter((key) => key === resolved || key.startsWith(prefix))
          .forEach((key) => listings.delete(key));
      }
      emit('remove', path.dirname(resolved), resolved);
    },
  };
};
