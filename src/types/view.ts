export const NotFound: unique symbol = Symbol('NotFound');
export type NotFound = typeof NotFound;

export type RowResult = number | NotFound;

export const isFound = (value: RowResult): value is number => value !== NotFound;

export type LayerListener = () => void;

/**
 * Shared contract of every transform in a view pipeline. Rows are local to the
 * layer; `mapToSource` goes one step down, `mapFromSource` one step up.
 */
export interface ViewLayer {
  readonly name: string;
  rowCount: () => number;
  mapToSource: (row: number) => RowResult;
  mapFromSource: (sourceRow: number) => RowResult;
  subscribe: (listener: LayerListener) => () => void;
}

/** The bottom layer of a chain: the one that talks to the EntrySource. */
export interface SourceLayer extends ViewLayer {
  directoryPath: () => string;
  pathAtSource: (sourceRow: number) => string | null;
  sourceRowOf: (entryPath: string) => RowResult;
}
