import path from 'path';

const pathApiFor = (platform: NodeJS.Platform) =>
  platform === 'win32' ? path.win32 : path.posix;

/**
 * Canonical key for a path: `.` and `..` resolved, native separators, no
 * trailing separator and, on Windows, lower case.
 */
export const normaliseStorePath = (
  raw: string,
  platform: NodeJS.Platform = process.platform,
): string => {
  const api = pathApiFor(platform);
  const resolved = api.resolve(raw);
  return platform === 'win32' ? resolved.toLowerCase() : resolved;
};

/** True when `candidate` is `root` itself or lies somewhere beneath it. */
export const isWithinPath = (
  root: string,
  candidate: string,
  platform: NodeJS.Platform = process.platform,
): boolean => {
  const api = pathApiFor(platform);
  const relative = api.relative(
    normaliseStorePath(root, platform),
    normaliseStorePath(candidate, platform),
  );
  if (relative === '') return true;
  if (relative === '..' || relative.startsWith(`..${api.sep}`)) return false;
  return !api.isAbsolute(relative);
};

export const isHiddenName = (name: string) => name.startsWith('.');
