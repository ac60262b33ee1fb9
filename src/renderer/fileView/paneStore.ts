import path from 'path';
import { IOFailureError, RenameConflictError } from '../../common/errors';
import { fsRenamer, isDisabled, toggle, type Renamer } from '../../common/nameCodec';
import type { Entry, EntrySource } from '../../types/entry';
import type { TagEditor, TagWriteResult } from '../../types/tags';
import { createScopedLogger } from '../../utils/logger';
import { logError, logToggle } from '../../utils/viewLogger';
import { createNavigationHistory, type NavigationHistory } from './navigationHistory';
import { createViewPipeline, type ViewPipeline } from './pipeline';

const logger = createScopedLogger('pane');

export interface PaneServices {
  source: EntrySource;
  tags: TagEditor;
  renamer?: Renamer;
}

export interface PaneOptions {
  id: string;
  initialPath: string;
  historyCapacity?: number;
}

export interface PaneState {
  id: string;
  currentPath: string;
  searchText: string;
  rowCount: number;
  canGoBack: boolean;
  canGoForward: boolean;
}

export type NavigateResult =
  | { ok: true; path: string }
  | { ok: false; path: string; reason: 'not-found' | 'not-directory' };

export type ToggleResult =
  | { ok: true; path: string; disabled: boolean; tags: TagWriteResult }
  | { ok: false; path: string; error: RenameConflictError | IOFailureError };

export type ActivateResult =
  | { kind: 'directory'; path: string }
  | { kind: 'file'; path: string }
  | { kind: 'missing' };

export interface PaneStore {
  readonly pipeline: ViewPipeline;
  readonly history: NavigationHistory;
  getState: () => PaneState;
  subscribe: (listener: (state: PaneState) => void) => () => void;
  navigate: (targetPath: string, options?: { addHistory?: boolean }) => NavigateResult;
  goBack: () => NavigateResult | null;
  goForward: () => NavigateResult | null;
  goUp: () => NavigateResult | null;
  refresh: () => void;
  setSearchText: (text: string) => void;
  entryAt: (row: number) => Entry | null;
  entries: () => Entry[];
  activate: (row: number) => ActivateResult;
  toggle: (entryPath: string) => ToggleResult;
  addTag: (entryPath: string, tag: string) => TagWriteResult;
  removeTag: (entryPath: string, tag: string) => TagWriteResult;
  clearTags: (entryPath: string) => TagWriteResult;
  dispose: () => void;
}

export const createPaneStore = (services: PaneServices, options: PaneOptions): PaneStore => {
  const { source, tags } = services;
  const renamer = services.renamer ?? fsRenamer;
  const history = createNavigationHistory(options.historyCapacity);
  const listeners = new Set<(state: PaneState) => void>();

  const snapshotState = (): PaneState => ({
    id: options.id,
    currentPath: pipeline.directoryPath(),
    searchText: pipeline.searchText(),
    rowCount: pipeline.rowCount(),
    canGoBack: history.canGoBack(),
    canGoForward: history.canGoForward(),
  });

  let state: PaneState | null = null;
  // Set while navigate() reshapes the pipeline so listeners see one update.
  let navigating = false;

  const update = () => {
    state = snapshotState();
    const next = state;
    listeners.forEach((listener) => listener(next));
  };

  const pipeline = createViewPipeline({
    source,
    tags,
    directoryPath: options.initialPath,
    onChange: () => {
      if (state && !navigating) update();
    },
  });

  let releaseWatch = source.watch(pipeline.directoryPath());

  const reportTagWrite = (result: TagWriteResult, entryPath: string) => {
    if (!result.ok) {
      logError(result.error, { stage: 'tags', path: entryPath, pane: options.id });
    }
    return result;
  };

  const navigate = (targetPath: string, navigateOptions: { addHistory?: boolean } = {}): NavigateResult => {
    const resolved = path.resolve(targetPath);
    const record = source.stat(resolved);
    if (!record || !record.isDirectory) {
      const reason = record ? 'not-directory' : 'not-found';
      logger.warn(`[${options.id}] Cannot open ${resolved} (${reason})`);
      return { ok: false, path: resolved, reason };
    }

    if (resolved !== pipeline.directoryPath()) {
      releaseWatch();
      releaseWatch = source.watch(resolved);
    }
    navigating = true;
    try {
      pipeline.setSearchText('');
      // A listing cached on an earlier visit may be stale.
      source.refresh(resolved);
      pipeline.setDirectory(resolved);
    } finally {
      navigating = false;
    }
    if (navigateOptions.addHistory ?? true) {
      history.push(resolved);
    }
    update();
    return { ok: true, path: resolved };
  };

  const store: PaneStore = {
    pipeline,
    history,
    getState: () => state ?? snapshotState(),
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    navigate,
    goBack() {
      const target = history.back();
      return target === null ? null : navigate(target, { addHistory: false });
    },
    goForward() {
      const target = history.forward();
      return target === null ? null : navigate(target, { addHistory: false });
    },
    goUp() {
      const current = pipeline.directoryPath();
      const parent = path.dirname(current);
      return parent === current ? null : navigate(parent);
    },
    refresh() {
      source.refresh(pipeline.directoryPath());
    },
    setSearchText(text) {
      pipeline.setSearchText(text);
    },
    entryAt: (row) => pipeline.entryAt(row),
    entries: () => pipeline.entries(),
    activate(row) {
      const entry = pipeline.entryAt(row);
      if (!entry) return { kind: 'missing' };
      if (entry.isDirectory) {
        const result = navigate(entry.path);
        return result.ok ? { kind: 'directory', path: entry.path } : { kind: 'missing' };
      }
      return { kind: 'file', path: entry.path };
    },
    toggle(entryPath) {
      const fromPath = path.resolve(entryPath);
      let toPath: string;
      try {
        toPath = toggle(fromPath, renamer);
      } catch (error: unknown) {
        if (error instanceof RenameConflictError || error instanceof IOFailureError) {
          logError(error, { stage: 'toggle', path: fromPath, pane: options.id });
          return { ok: false, path: fromPath, error };
        }
        throw error;
      }

      const disabled = isDisabled(path.basename(toPath));
      const tagResult = reportTagWrite(tags.move(fromPath, toPath), toPath);
      source.refresh(path.dirname(fromPath), 'rename');
      logToggle({ fromPath, toPath, disabled });
      return { ok: true, path: toPath, disabled, tags: tagResult };
    },
    addTag: (entryPath, tag) => reportTagWrite(tags.add(entryPath, tag), entryPath),
    removeTag: (entryPath, tag) => reportTagWrite(tags.remove(entryPath, tag), entryPath),
    clearTags: (entryPath) => reportTagWrite(tags.clear(entryPath), entryPath),
    dispose() {
      releaseWatch();
      pipeline.dispose();
      listeners.clear();
    },
  };

  const initial = navigate(options.initialPath);
  if (!initial.ok) {
    state = snapshotState();
  }

  return store;
};
