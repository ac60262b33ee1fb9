import fs from 'fs';
import path from 'path';
import { IOFailureError, RenameConflictError, describeError, errorCodeOf } from './errors';

/** Canonical on-disk marker. Matched case-insensitively on read. */
export const DISABLED_PREFIX = 'DISABLED_';

const stripUnderscores = (value: string) => value.replace(/^_+|_+$/g, '');

export const isDisabled = (rawName: string): boolean =>
  rawName.slice(0, DISABLED_PREFIX.length).toUpperCase() === DISABLED_PREFIX;

export const effectiveName = (rawName: string): string =>
  stripUnderscores(isDisabled(rawName) ? rawName.slice(DISABLED_PREFIX.length) : rawName);

/**
 * Name the entry gets after a toggle. Re-enabling also trims boundary
 * underscores, so `_a_` → `DISABLED__a_` → `a`.
 */
export const toggledName = (rawName: string): string =>
  isDisabled(rawName)
    ? stripUnderscores(rawName.slice(DISABLED_PREFIX.length))
    : `${DISABLED_PREFIX}${rawName}`;

export interface Renamer {
  exists: (targetPath: string) => boolean;
  rename: (fromPath: string, toPath: string) => void;
}

export const fsRenamer: Renamer = {
  exists: (targetPath) => fs.existsSync(targetPath),
  rename: (fromPath, toPath) => fs.renameSync(fromPath, toPath),
};

/**
 * Renames `entryPath` to its toggled name in the same directory and returns the
 * new path. Nothing changes on disk when this throws.
 */
export const toggle = (entryPath: string, renamer: Renamer = fsRenamer): string => {
  const absolutePath = path.resolve(entryPath);
  const targetName = toggledName(path.basename(absolutePath));
  if (!targetName) {
    throw new IOFailureError(absolutePath, `Cannot toggle ${absolutePath}: empty target name`);
  }
  const targetPath = path.join(path.dirname(absolutePath), targetName);

  if (renamer.exists(targetPath)) {
    throw new RenameConflictError(absolutePath, targetPath);
  }

  try {
    renamer.rename(absolutePath, targetPath);
  } catch (error: unknown) {
    const code = errorCodeOf(error);
    if (code === 'EEXIST' || code === 'ENOTEMPTY') {
      throw new RenameConflictError(absolutePath, targetPath);
    }
    throw new IOFailureError(
      absolutePath,
      `Failed to rename ${absolutePath}: ${describeError(error)}`,
      error,
    );
  }

  return targetPath;
};
