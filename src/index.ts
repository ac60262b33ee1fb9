export * from './common/errors';
export { DISABLED_PREFIX, effectiveName, fsRenamer, isDisabled, toggle, toggledName } from './common/nameCodec';
export type { Renamer } from './common/nameCodec';
export { materialiseEntry } from './common/entries';
export { createMemoryEntrySource } from './common/memoryEntrySource';
export type { MemoryEntrySource, MemoryNodeInput } from './common/memoryEntrySource';
export { isWithinPath, normaliseStorePath } from './common/path';

export { createTwinPaneBrowser } from './main/browser';
export type { TwinPaneBrowser, TwinPaneBrowserOptions } from './main/browser';
export { parseBoolean, parseLogLevel, resolveBrowserConfig } from './main/config';
export type { BrowserConfig } from './main/config';
export { createFsEntrySource } from './main/entrySource';
export type { FsEntrySource, FsEntrySourceOptions } from './main/entrySource';
export { DEFAULT_TAGS_FILE, loadTagStore } from './main/tagStore';
export type { TagStore, TagStoreLoadResult, TagStoreOptions } from './main/tagStore';

export { createFilterLayer } from './renderer/fileView/filterLayer';
export type { FilterLayer, FilterLayerOptions } from './renderer/fileView/filterLayer';
export { createNavigationHistory } from './renderer/fileView/navigationHistory';
export type { NavigationHistory } from './renderer/fileView/navigationHistory';
export { createPaneStore } from './renderer/fileView/paneStore';
export type {
  ActivateResult,
  NavigateResult,
  PaneOptions,
  PaneServices,
  PaneState,
  PaneStore,
  ToggleResult,
} from './renderer/fileView/paneStore';
export {
  createViewPipeline,
  mapRowFromSource,
  mapRowToSource,
  resolvePathRow,
  resolveRowPath,
} from './renderer/fileView/pipeline';
export type { LayerChain, ViewPipeline, ViewPipelineOptions } from './renderer/fileView/pipeline';
export { compareSortKeys, createSortLayer } from './renderer/fileView/sortLayer';
export type { SortLayer } from './renderer/fileView/sortLayer';

export * from './types/entry';
export * from './types/tags';
export * from './types/view';
