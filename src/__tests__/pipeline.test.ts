/**
 * @jest-environment node
 */
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { createMemoryEntrySource } from '../common/memoryEntrySource';
import { loadTagStore, type TagStore } from '../main/tagStore';
import { createViewPipeline, mapRowFromSource, mapRowToSource } from '../renderer/fileView/pipeline';
import { NotFound } from '../types/view';

describe('viewPipeline', () => {
  const root = path.resolve('/library');
  const at = (...segments: string[]) => path.join(root, ...segments);
  let tempDir: string;
  let tags: TagStore;

  const createSource = () =>
    createMemoryEntrySource(root, [
      { name: 'notes.txt', size: 12 },
      { name: 'DISABLED_Archive', children: [{ name: 'old.md' }] },
      { name: 'data.zzz' },
      { name: 'images', children: [{ name: 'cover.png' }, { name: 'back.png' }] },
    ]);

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pipeline-'));
    tags = loadTagStore(path.join(tempDir, 'tags.json')).store;
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('materialises entries in display order', () => {
    const pipeline = createViewPipeline({ source: createSource(), tags, directoryPath: root });

    expect(pipeline.entries()).toEqual([
      {
        path: at('DISABLED_Archive'),
        rawName: 'DISABLED_Archive',
        effectiveName: 'Archive',
        isDisabled: true,
        isDirectory: true,
        size: 0,
        modifiedTime: '2024-01-01T00:00:00.000Z',
        mimeType: null,
      },
      {
        path: at('data.zzz'),
        rawName: 'data.zzz',
        effectiveName: 'data.zzz',
        isDisabled: false,
        isDirectory: false,
        size: 0,
        modifiedTime: '2024-01-01T00:00:00.000Z',
        mimeType: null,
      },
      {
        path: at('images'),
        rawName: 'images',
        effectiveName: 'images',
        isDisabled: false,
        isDirectory: true,
        size: 0,
        modifiedTime: '2024-01-01T00:00:00.000Z',
        mimeType: null,
      },
      {
        path: at('notes.txt'),
        rawName: 'notes.txt',
        effectiveName: 'notes.txt',
        isDisabled: false,
        isDirectory: false,
        size: 12,
        modifiedTime: '2024-01-01T00:00:00.000Z',
        mimeType: 'text/plain',
      },
    ]);
  });

  it('maps paths to rows and back through both layers', () => {
    const pipeline = createViewPipeline({ source: createSource(), tags, directoryPath: root });

    for (let row = 0; row < pipeline.rowCount(); row += 1) {
      const entryPath = pipeline.pathAt(row);
      expect(entryPath).not.toBeNull();
      if (entryPath) {
        expect(pipeline.rowOf(entryPath)).toBe(row);
      }
    }
    expect(pipeline.pathAt(4)).toBeNull();
    expect(pipeline.entryAt(-1)).toBeNull();
    expect(pipeline.rowOf(at('images', 'cover.png'))).toBe(NotFound);
  });

  it('walks the chain in both directions', () => {
    const pipeline = createViewPipeline({ source: createSource(), tags, directoryPath: root });
    pipeline.setSearchText('a');

    // Visible: DISABLED_Archive, data.zzz, images
    expect(mapRowToSource(pipeline.layers, 1)).toBe(2);
    expect(mapRowFromSource(pipeline.layers, 2)).toBe(1);
    expect(mapRowFromSource(pipeline.layers, 0)).toBe(NotFound);
    expect(mapRowToSource(pipeline.layers, 3)).toBe(NotFound);
    expect(pipeline.mapToSource(2)).toBe(2);
  });

  it('hides rows the search excludes from path lookups', () => {
    const pipeline = createViewPipeline({
      source: createSource(),
      tags,
      directoryPath: root,
      searchText: 'img',
    });
    tags.add(at('images'), 'img');

    expect(pipeline.rowCount()).toBe(1);
    expect(pipeline.pathAt(0)).toBe(at('images'));
    expect(pipeline.rowOf(at('notes.txt'))).toBe(NotFound);
  });

  it('scopes the search to the new directory after switching', () => {
    const pipeline = createViewPipeline({ source: createSource(), tags, directoryPath: root });

    pipeline.setDirectory(at('images'));

    expect(pipeline.directoryPath()).toBe(at('images'));
    expect(pipeline.filter.rootPath()).toBe(at('images'));
    expect(pipeline.entries().map((entry) => entry.rawName)).toEqual(['back.png', 'cover.png']);
    expect(pipeline.entryAt(0)?.mimeType).toBe('image/png');
  });

  it('reports changes from any layer', () => {
    const source = createSource();
    const onChange = jest.fn();
    const pipeline = createViewPipeline({ source, tags, directoryPath: root, onChange });

    source.add(root, { name: 'fresh.txt' });
    expect(onChange).toHaveBeenCalledTimes(1);

    pipeline.setSearchText('fresh');
    expect(onChange).toHaveBeenCalledTimes(2);
    expect(pipeline.rowCount()).toBe(1);

    pipeline.dispose();
    source.add(root, { name: 'later.txt' });
    expect(onChange).toHaveBeenCalledTimes(2);
  });
});
