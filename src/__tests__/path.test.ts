import path from 'path';
import { isHiddenName, isWithinPath, normaliseStorePath } from '../common/path';

describe('normaliseStorePath', () => {
  it('resolves dot segments and trailing separators on posix', () => {
    expect(normaliseStorePath('/data/projects/./alpha/../beta/', 'linux')).toBe('/data/projects/beta');
  });

  it('resolves relative paths against the working directory', () => {
    expect(normaliseStorePath('notes.txt', 'linux')).toBe(path.posix.resolve('notes.txt'));
  });

  it('keeps case on posix', () => {
    expect(normaliseStorePath('/Data/Readme.MD', 'linux')).toBe('/Data/Readme.MD');
  });

  it('lower-cases and uses backslashes on windows', () => {
    expect(normaliseStorePath('C:/Users/Test/Docs/', 'win32')).toBe('c:\\users\\test\\docs');
  });
});

describe('isWithinPath', () => {
  it('accepts the root itself and its descendants', () => {
    expect(isWithinPath('/data', '/data', 'linux')).toBe(true);
    expect(isWithinPath('/data', '/data/a/b.txt', 'linux')).toBe(true);
  });

  it('rejects siblings and parents', () => {
    expect(isWithinPath('/data/a', '/data/b', 'linux')).toBe(false);
    expect(isWithinPath('/data/a', '/data', 'linux')).toBe(false);
    expect(isWithinPath('/data/a', '/data/ab', 'linux')).toBe(false);
  });

  it('treats names starting with two dots as children', () => {
    expect(isWithinPath('/data', '/data/..hidden', 'linux')).toBe(true);
  });

  it('ignores case on windows', () => {
    expect(isWithinPath('C:\\Data', 'c:\\data\\File.txt', 'win32')).toBe(true);
  });
});

describe('isHiddenName', () => {
  it('flags dot-files only', () => {
    expect(isHiddenName('.tags.json')).toBe(true);
    expect(isHiddenName('tags.json')).toBe(false);
  });
});
