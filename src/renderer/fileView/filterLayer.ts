import path from 'path';
import { effectiveName } from '../../common/nameCodec';
import { isWithinPath } from '../../common/path';
import type { TagReader } from '../../types/tags';
import { NotFound, type LayerListener, type ViewLayer } from '../../types/view';
import { logFilterRebuild } from '../../utils/viewLogger';

export interface FilterLayerOptions {
  base: ViewLayer;
  tags: TagReader;
  /** Resolves a row of `base` to an absolute path by walking the chain below. */
  resolvePath: (baseRow: number) => string | null;
  rootPath?: string;
  searchText?: string;
}

export interface FilterLayer extends ViewLayer {
  searchText: () => string;
  setSearchText: (text: string) => void;
  rootPath: () => string;
  setRootPath: (rootPath: string) => void;
  /** Drops the row mapping; it is rebuilt on next access. */
  invalidate: () => void;
  dispose: () => void;
}

interface RowMapping {
  rows: number[];
  inverse: Map<number, number>;
}

export const createFilterLayer = (options: FilterLayerOptions): FilterLayer => {
  const { base, tags, resolvePath } = options;
  let searchText = options.searchText ?? '';
  let needle = searchText.toLowerCase();
  let rootPath = options.rootPath ? path.resolve(options.rootPath) : '';
  let mapping: RowMapping | null = null;
  const listeners = new Set<LayerListener>();

  const invalidate = () => {
    mapping = null;
    listeners.forEach((listener) => listener());
  };

  const build = (): RowMapping => {
    const total = base.rowCount();
    const rows: number[] = [];
    let tagLookups = 0;

    const accepts = (baseRow: number) => {
      if (!needle) return true;
      const entryPath = resolvePath(baseRow);
      if (!entryPath) return true;
      if (rootPath && !isWithinPath(rootPath, entryPath)) return true;
      if (effectiveName(path.basename(entryPath)).toLowerCase().includes(needle)) {
        return true;
      }
      tagLookups += 1;
      return tags.get(entryPath).some((tag) => tag.toLowerCase().includes(needle));
    };

    for (let baseRow = 0; baseRow < total; baseRow += 1) {
      if (accepts(baseRow)) rows.push(baseRow);
    }

    logFilterRebuild({
      searchText,
      rootPath,
      visibleRows: rows.length,
      totalRows: total,
      tagLookups,
    });
    return { rows, inverse: new Map(rows.map((baseRow, row) => [baseRow, row])) };
  };

  const current = () => {
    if (!mapping) {
      mapping = build();
    }
    return mapping;
  };

  const unsubscribeBase = base.subscribe(invalidate);
  const unsubscribeTags = tags.subscribe(() => {
    if (needle) invalidate();
  });

  return {
    name: 'filter',
    rowCount: () => current().rows.length,
    mapToSource(row) {
      const { rows } = current();
      return Number.isInteger(row) && row >= 0 && row < rows.length ? rows[row] : NotFound;
    },
    mapFromSource(sourceRow) {
      return current().inverse.get(sourceRow) ?? NotFound;
    },
    searchText: () => searchText,
    setSearchText(text) {
      searchText = text;
      needle = text.toLowerCase();
      invalidate();
    },
    rootPath: () => rootPath,
    setRootPath(nextRoot) {
      rootPath = nextRoot ? path.resolve(nextRoot) : '';
      invalidate();
    },
    invalidate,
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    dispose() {
      unsubscribeBase();
      unsubscribeTags();
      listeners.clear();
    },
  };
};
