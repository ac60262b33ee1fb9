import { materialiseEntry } from '../../common/entries';
import type { Entry, EntrySource } from '../../types/entry';
import type { TagReader } from '../../types/tags';
import { NotFound, isFound, type RowResult, type SourceLayer, type ViewLayer } from '../../types/view';
import { createFilterLayer, type FilterLayer } from './filterLayer';
import { createSortLayer, type SortLayer } from './sortLayer';

/**
 * Layers ordered top to bottom. The last one is `owner`, whose source rows
 * index the EntrySource listing.
 */
export interface LayerChain {
  layers: readonly ViewLayer[];
  owner: SourceLayer;
}

export const mapRowToSource = (layers: readonly ViewLayer[], row: number): RowResult => {
  let current: RowResult = row;
  for (const layer of layers) {
    if (!isFound(current)) return NotFound;
    current = layer.mapToSource(current);
  }
  return current;
};

/** Walks upwards; a layer that excludes the row ends the walk with NotFound. */
export const mapRowFromSource = (layers: readonly ViewLayer[], sourceRow: number): RowResult => {
  let current: RowResult = sourceRow;
  for (let index = layers.length - 1; index >= 0; index -= 1) {
    if (!isFound(current)) return NotFound;
    current = layers[index].mapFromSource(current);
  }
  return current;
};

export const resolveRowPath = (chain: LayerChain, row: number): string | null => {
  const sourceRow = mapRowToSource(chain.layers, row);
  return isFound(sourceRow) ? chain.owner.pathAtSource(sourceRow) : null;
};

export const resolvePathRow = (chain: LayerChain, entryPath: string): RowResult => {
  const sourceRow = chain.owner.sourceRowOf(entryPath);
  return isFound(sourceRow) ? mapRowFromSource(chain.layers, sourceRow) : NotFound;
};

export interface ViewPipelineOptions {
  source: EntrySource;
  tags: TagReader;
  directoryPath: string;
  searchText?: string;
  /** Called after any layer in the chain changed its rows. */
  onChange?: () => void;
}

export interface ViewPipeline {
  readonly source: EntrySource;
  readonly sort: SortLayer;
  readonly filter: FilterLayer;
  readonly layers: readonly [FilterLayer, SortLayer];
  rowCount: () => number;
  mapToSource: (row: number) => RowResult;
  pathAt: (row: number) => string | null;
  entryAt: (row: number) => Entry | null;
  rowOf: (entryPath: string) => RowResult;
  entries: () => Entry[];
  directoryPath: () => string;
  setDirectory: (directoryPath: string) => void;
  searchText: () => string;
  setSearchText: (text: string) => void;
  dispose: () => void;
}

export const createViewPipeline = (options: ViewPipelineOptions): ViewPipeline => {
  const { source, tags } = options;
  const sort = createSortLayer(source, options.directoryPath);
  const filter = createFilterLayer({
    base: sort,
    tags,
    resolvePath: (sortRow) => resolveRowPath({ layers: [sort], owner: sort }, sortRow),
    rootPath: sort.directoryPath(),
    searchText: options.searchText,
  });
  const layers = [filter, sort] as const;
  const chain: LayerChain = { layers, owner: sort };

  const unsubscribe = options.onChange ? filter.subscribe(options.onChange) : () => {};

  const entryAt = (row: number): Entry | null => {
    const entryPath = resolveRowPath(chain, row);
    if (!entryPath) return null;
    const record = source.stat(entryPath);
    return record ? materialiseEntry(record) : null;
  };

  return {
    source,
    sort,
    filter,
    layers,
    rowCount: () => filter.rowCount(),
    mapToSource: (row) => filter.mapToSource(row),
    pathAt: (row) => resolveRowPath(chain, row),
    entryAt,
    rowOf: (entryPath) => resolvePathRow(chain, entryPath),
    entries() {
      const result: Entry[] = [];
      for (let row = 0; row < filter.rowCount(); row += 1) {
        const entry = entryAt(row);
        if (entry) result.push(entry);
      }
      return result;
    },
    directoryPath: () => sort.directoryPath(),
    setDirectory(directoryPath) {
      sort.setDirectory(directoryPath);
      filter.setRootPath(sort.directoryPath());
    },
    searchText: () => filter.searchText(),
    setSearchText: (text) => filter.setSearchText(text),
    dispose() {
      unsubscribe();
      filter.dispose();
      sort.dispose();
    },
  };
};
