export type BrowserErrorCode =
  | 'RENAME_CONFLICT'
  | 'IO_FAILURE'
  | 'CORRUPT_STORE'
  | 'PERSIST_FAILURE';

export class BrowserCoreError extends Error {
  public readonly code: BrowserErrorCode;
  public readonly path: string;
  public override readonly name: string = 'BrowserCoreError';

  constructor(code: BrowserErrorCode, path: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.code = code;
    this.path = path;
  }
}

export class RenameConflictError extends BrowserCoreError {
  public override readonly name = 'RenameConflictError';

  constructor(path: string, public readonly targetPath: string) {
    super('RENAME_CONFLICT', path, `Cannot rename ${path}: ${targetPath} already exists`);
  }
}

export class IOFailureError extends BrowserCoreError {
  public override readonly name = 'IOFailureError';

  constructor(path: string, message: string, cause?: unknown) {
    super('IO_FAILURE', path, message, cause);
  }
}

export class CorruptStoreError extends BrowserCoreError {
  public override readonly name = 'CorruptStoreError';

  constructor(path: string, message: string, cause?: unknown) {
    super('CORRUPT_STORE', path, message, cause);
  }
}

export class PersistFailureError extends BrowserCoreError {
  public override readonly name = 'PersistFailureError';

  constructor(path: string, message: string, cause?: unknown) {
    super('PERSIST_FAILURE', path, message, cause);
  }
}

export function isBrowserCoreError(error: unknown): error is BrowserCoreError {
  return error instanceof BrowserCoreError;
}

export const errorCodeOf = (error: unknown): string | undefined => {
  if (error && typeof error === 'object' && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
};

export const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
