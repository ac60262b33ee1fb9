import path from 'path';
import { performance } from 'perf_hooks';
import { effectiveName } from '../../common/nameCodec';
import type { EntrySource } from '../../types/entry';
import { NotFound, type LayerListener, type RowResult, type SourceLayer } from '../../types/view';
import { logResort } from '../../utils/viewLogger';

export interface SortLayer extends SourceLayer {
  setDirectory: (directoryPath: string) => void;
  /** Rebuilds the order from the current listing. */
  resort: () => void;
  dispose: () => void;
}

const compareString = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

interface SortKey {
  index: number;
  nameKey: string;
  rawName: string;
}

/** Effective name, case-insensitive, then raw name, then listing position. */
export const compareSortKeys = (a: SortKey, b: SortKey) =>
  compareString(a.nameKey, b.nameKey) || compareString(a.rawName, b.rawName) || a.index - b.index;

const isRowIndex = (row: number, count: number) => Number.isInteger(row) && row >= 0 && row < count;

export const createSortLayer = (source: EntrySource, initialDirectory: string): SortLayer => {
  let directoryPath = path.resolve(initialDirectory);
  let order: number[] = [];
  let inverse: number[] = [];
  const listeners = new Set<LayerListener>();

  const resort = () => {
    const startedAt = performance.now();
    const records = source.children(directoryPath);
    const keys = records.map((record, index) => ({
      index,
      nameKey: effectiveName(record.rawName).toLowerCase(),
      rawName: record.rawName,
    }));
    keys.sort(compareSortKeys);

    order = keys.map((key) => key.index);
    inverse = new Array<number>(records.length);
    order.forEach((sourceRow, row) => {
      inverse[sourceRow] = row;
    });

    logResort({
      directoryPath,
      rowCount: order.length,
      durationMs: performance.now() - startedAt,
      orderedNames: keys.map((key) => key.rawName),
    });
    listeners.forEach((listener) => listener());
  };

  const unsubscribe = source.subscribe((event) => {
    if (event.directoryPath === directoryPath) {
      resort();
    }
  });

  resort();

  return {
    name: 'sort',
    directoryPath: () => directoryPath,
    rowCount: () => order.length,
    mapToSource(row) {
      return isRowIndex(row, order.length) ? order[row] : NotFound;
    },
    mapFromSource(sourceRow): RowResult {
      return isRowIndex(sourceRow, inverse.length) ? inverse[sourceRow] : NotFound;
    },
    pathAtSource(sourceRow) {
      if (!isRowIndex(sourceRow, order.length)) return null;
      return source.filePath({ directoryPath, row: sourceRow });
    },
    sourceRowOf(entryPath) {
      const handle = source.index(entryPath);
      if (!handle || handle.directoryPath !== directoryPath) return NotFound;
      return isRowIndex(handle.row, inverse.length) ? handle.row : NotFound;
    },
    setDirectory(nextDirectory) {
      directoryPath = path.resolve(nextDirectory);
      resort();
    },
    resort,
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    dispose() {
      unsubscribe();
      listeners.clear();
    },
  };
};
