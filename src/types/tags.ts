import type { PersistFailureError } from '../common/errors';

export type TagSet = readonly string[];

/** On-disk shape: normalised absolute path → tags. */
export type TagDocument = Record<string, string[]>;

export interface TagChangeEvent {
  path: string;
  tags: TagSet;
}

export type TagChangeListener = (event: TagChangeEvent) => void;

export type TagWriteResult =
  | { ok: true; tags: TagSet }
  | { ok: false; tags: TagSet; error: PersistFailureError };

/** Read side of the store, which is all the view layers need. */
export interface TagReader {
  get: (entryPath: string) => TagSet;
  subscribe: (listener: TagChangeListener) => () => void;
}

/** Write side used by panes; all edits are addressed by path. */
export interface TagEditor extends TagReader {
  add: (entryPath: string, tag: string) => TagWriteResult;
  remove: (entryPath: string, tag: string) => TagWriteResult;
  clear: (entryPath: string) => TagWriteResult;
  move: (fromPath: string, toPath: string) => TagWriteResult;
}
