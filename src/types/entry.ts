export interface EntryRecord {
  /** Absolute, OS-native path */
  path: string;
  /** Literal on-disk base name */
  rawName: string;
  isDirectory: boolean;
  /** Size in bytes */
  size: number;
  /** ISO timestamp of the last modification */
  modifiedTime: string;
}

export interface Entry extends EntryRecord {
  /** Raw name without the disable marker and boundary underscores */
  effectiveName: string;
  isDisabled: boolean;
  /** MIME type inferred from the extension (files only) */
  mimeType: string | null;
}

/**
 * Position of an entry inside the listing an EntrySource currently holds for
 * its parent directory. Only valid until the next change event for that
 * directory.
 */
export interface EntryHandle {
  readonly directoryPath: string;
  readonly row: number;
}

export type EntryChangeReason = 'insert' | 'remove' | 'rename' | 'update' | 'refresh';

export interface EntryChangeEvent {
  reason: EntryChangeReason;
  directoryPath: string;
  path?: string;
}

export type EntryChangeListener = (event: EntryChangeEvent) => void;

export interface EntrySource {
  /** Children of a directory, in no particular order. */
  children: (directoryPath: string) => EntryRecord[];
  index: (entryPath: string) => EntryHandle | null;
  filePath: (handle: EntryHandle) => string | null;
  /** Fresh metadata for a single path, or null when it no longer exists. */
  stat: (entryPath: string) => EntryRecord | null;
  subscribe: (listener: EntryChangeListener) => () => void;
  /** Re-reads a directory and notifies subscribers synchronously. */
  refresh: (directoryPath: string, reason?: EntryChangeReason) => void;
  /** Starts reporting external changes under a directory; returns the release. */
  watch: (directoryPath: string) => () => void;
}
