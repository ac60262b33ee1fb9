/**
 * @jest-environment node
 */
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { IOFailureError, PersistFailureError, RenameConflictError } from '../common/errors';
import { createMemoryEntrySource, type MemoryEntrySource } from '../common/memoryEntrySource';
import { loadTagStore, type TagStore } from '../main/tagStore';
import { createPaneStore, type PaneState } from '../renderer/fileView/paneStore';

describe('paneStore', () => {
  const root = path.resolve('/projects');
  const at = (...segments: string[]) => path.join(root, ...segments);
  let tempDir: string;
  let tags: TagStore;
  let source: MemoryEntrySource;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pane-store-'));
    tags = loadTagStore(path.join(tempDir, 'tags.json')).store;
    source = createMemoryEntrySource(root, [
      { name: 'Foo' },
      { name: 'DISABLED_Bar' },
      { name: 'baz', children: [{ name: 'inner.txt' }, { name: 'deep', children: [] }] },
      { name: 'readme.md' },
    ]);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const createPane = () => createPaneStore({ source, tags, renamer: source }, { id: 'left', initialPath: root });

  const rawNames = (pane: ReturnType<typeof createPane>) => pane.entries().map((entry) => entry.rawName);

  it('opens the initial directory', () => {
    const pane = createPane();

    expect(pane.getState()).toEqual({
      id: 'left',
      currentPath: root,
      searchText: '',
      rowCount: 4,
      canGoBack: false,
      canGoForward: false,
    });
    expect(rawNames(pane)).toEqual(['DISABLED_Bar', 'baz', 'Foo', 'readme.md']);
  });

  it('navigates and walks its history', () => {
    const pane = createPane();

    expect(pane.navigate(at('baz'))).toEqual({ ok: true, path: at('baz') });
    expect(rawNames(pane)).toEqual(['deep', 'inner.txt']);
    expect(pane.getState().canGoBack).toBe(true);

    expect(pane.goBack()).toEqual({ ok: true, path: root });
    expect(pane.getState()).toMatchObject({ currentPath: root, canGoBack: false, canGoForward: true });

    expect(pane.goForward()).toEqual({ ok: true, path: at('baz') });
    expect(pane.goForward()).toBeNull();

    expect(pane.goUp()).toEqual({ ok: true, path: root });
    expect(pane.history.entries().paths).toEqual([root, at('baz'), root]);
  });

  it('refuses files and missing paths', () => {
    const pane = createPane();

    expect(pane.navigate(at('readme.md'))).toEqual({
      ok: false,
      path: at('readme.md'),
      reason: 'not-directory',
    });
    expect(pane.navigate(at('gone'))).toEqual({ ok: false, path: at('gone'), reason: 'not-found' });
    expect(pane.getState().currentPath).toBe(root);
  });

  it('stops at the top of the file system', () => {
    const top = path.parse(root).root;
    const pane = createPaneStore(
      { source: createMemoryEntrySource(top, []), tags },
      { id: 'right', initialPath: top },
    );

    expect(pane.goUp()).toBeNull();
  });

  it('clears the search when the directory changes', () => {
    const pane = createPane();
    pane.setSearchText('ba');
    expect(pane.getState()).toMatchObject({ searchText: 'ba', rowCount: 2 });

    pane.navigate(at('baz'));

    expect(pane.getState()).toMatchObject({ searchText: '', rowCount: 2 });
  });

  it('notifies subscribers once per navigation', () => {
    const pane = createPane();
    const states: PaneState[] = [];
    pane.subscribe((state) => states.push(state));

    pane.setSearchText('foo');
    pane.navigate(at('baz'));

    expect(states.map((state) => [state.currentPath, state.searchText, state.rowCount])).toEqual([
      [root, 'foo', 1],
      [at('baz'), '', 2],
    ]);
  });

  it('activates directories by entering them', () => {
    const pane = createPane();

    expect(pane.activate(3)).toEqual({ kind: 'file', path: at('readme.md') });
    expect(pane.activate(1)).toEqual({ kind: 'directory', path: at('baz') });
    expect(pane.getState().currentPath).toBe(at('baz'));
    expect(pane.activate(9)).toEqual({ kind: 'missing' });
  });

  it('toggles an entry, keeps its row and carries its tags', () => {
    const pane = createPane();
    tags.add(at('DISABLED_Bar'), 'keep');

    const result = pane.toggle(at('DISABLED_Bar'));

    expect(result).toEqual({ ok: true, path: at('Bar'), disabled: false, tags: { ok: true, tags: ['keep'] } });
    expect(rawNames(pane)).toEqual(['Bar', 'baz', 'Foo', 'readme.md']);
    expect(pane.entryAt(0)?.isDisabled).toBe(false);
    expect(tags.get(at('Bar'))).toEqual(['keep']);
    expect(tags.get(at('DISABLED_Bar'))).toEqual([]);
  });

  it('restores the effective name after toggling twice', () => {
    const pane = createPane();

    const first = pane.toggle(at('Foo'));
    expect(first).toMatchObject({ ok: true, path: at('DISABLED_Foo'), disabled: true });
    const second = pane.toggle(at('DISABLED_Foo'));
    expect(second).toMatchObject({ ok: true, path: at('Foo'), disabled: false });
    expect(rawNames(pane)).toEqual(['DISABLED_Bar', 'baz', 'Foo', 'readme.md']);
  });

  it('returns a conflict without touching the listing', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    source.add(root, { name: 'Bar' });
    const pane = createPane();

    const result = pane.toggle(at('DISABLED_Bar'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(RenameConflictError);
      expect(result.path).toBe(at('DISABLED_Bar'));
    }
    expect(rawNames(pane)).toEqual(['Bar', 'DISABLED_Bar', 'baz', 'Foo', 'readme.md']);
    expect(errorSpy).toHaveBeenCalled();
  });

  it('returns IO failures from the renamer', () => {
    jest.spyOn(console, 'error').mockImplementation(() => {});
    const pane = createPaneStore(
      {
        source,
        tags,
        renamer: {
          exists: () => false,
          rename: () => {
            throw Object.assign(new Error('EPERM: operation not permitted'), { code: 'EPERM' });
          },
        },
      },
      { id: 'left', initialPath: root },
    );

    const result = pane.toggle(at('Foo'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(IOFailureError);
    }
  });

  it('rethrows unexpected errors', () => {
    const pane = createPaneStore(
      {
        source,
        tags,
        renamer: {
          exists: () => {
            throw new TypeError('broken renamer');
          },
          rename: () => {},
        },
      },
      { id: 'left', initialPath: root },
    );

    expect(() => pane.toggle(at('Foo'))).toThrow(TypeError);
  });

  it('edits tags by path', () => {
    const pane = createPane();

    expect(pane.addTag(at('Foo'), 'red')).toEqual({ ok: true, tags: ['red'] });
    expect(pane.addTag(at('Foo'), 'blue')).toEqual({ ok: true, tags: ['red', 'blue'] });
    expect(pane.removeTag(at('Foo'), 'red')).toEqual({ ok: true, tags: ['blue'] });
    expect(pane.clearTags(at('Foo'))).toEqual({ ok: true, tags: [] });
  });

  it('reports tag writes that could not be saved', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    const blocker = path.join(tempDir, 'blocker');
    await fs.writeFile(blocker, 'file');
    const brokenTags = loadTagStore(path.join(blocker, 'tags.json')).store;
    const pane = createPaneStore({ source, tags: brokenTags }, { id: 'left', initialPath: root });

    const result = pane.addTag(at('Foo'), 'red');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(PersistFailureError);
    }
    expect(result.tags).toEqual(['red']);
    expect(errorSpy).toHaveBeenCalled();
  });

  it('watches the open directory and releases it on the way out', () => {
    const releases = new Map<string, jest.Mock>();
    const watchSpy = jest.spyOn(source, 'watch').mockImplementation((directoryPath: string) => {
      const release = jest.fn();
      releases.set(directoryPath, release);
      return release;
    });
    const pane = createPane();

    pane.navigate(at('baz'));
    expect(watchSpy.mock.calls.map(([directoryPath]) => directoryPath)).toEqual([root, at('baz')]);
    expect(releases.get(root)).toHaveBeenCalledTimes(1);

    pane.dispose();
    expect(releases.get(at('baz'))).toHaveBeenCalledTimes(1);
  });

  it('re-reads the open directory on refresh', () => {
    const refreshSpy = jest.spyOn(source, 'refresh');
    const pane = createPane();

    pane.refresh();

    expect(refreshSpy).toHaveBeenCalledWith(root);
  });
});
