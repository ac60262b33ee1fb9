export interface NavigationHistory {
  /** Records a visit; drops forward entries and ignores a repeat of the current one. */
  push: (entryPath: string) => void;
  back: () => string | null;
  forward: () => string | null;
  current: () => string | null;
  canGoBack: () => boolean;
  canGoForward: () => boolean;
  entries: () => { paths: readonly string[]; cursor: number };
}

export const createNavigationHistory = (capacity = 100): NavigationHistory => {
  let paths: string[] = [];
  let cursor = -1;

  return {
    push(entryPath: string) {
      if (cursor < paths.length - 1) {
        paths = paths.slice(0, cursor + 1);
      }
      if (paths[paths.length - 1] === entryPath) {
        return;
      }
      paths.push(entryPath);
      if (paths.length > capacity) {
        paths.shift();
      }
      cursor = paths.length - 1;
    },
    back() {
      if (cursor <= 0) return null;
      cursor -= 1;
      return paths[cursor];
    },
    forward() {
      if (cursor >= paths.length - 1) return null;
      cursor += 1;
      return paths[cursor];
    },
    current() {
      return cursor >= 0 ? paths[cursor] : null;
    },
    canGoBack() {
      return cursor > 0;
    },
    canGoForward() {
      return cursor < paths.length - 1;
    },
    entries() {
      return { paths: [...paths], cursor };
    },
  };
};
