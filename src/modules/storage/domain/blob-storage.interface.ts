/**
 * Physical blob backend. Paths are storage-relative (`<characterId>/<file>`)
 * and never contain `..` segments.
 */
export interface IBlobStorage {
  /** Fails with `StorageError` when the blob cannot be written. */
  write(path: string, body: Buffer, contentType: string): Promise<void>;
  /** Resolves `false` when the blob is already gone. */
  delete(path: string): Promise<boolean>;
  /** Resolves `null` when the blob does not exist. */
  read(path: string): Promise<Buffer | null>;
  urlFor(path: string): string;
}

export const IBlobStorageToken = Symbol('IBlobStorage');

export const joinUrl = (base: string, ...parts: string[]) => {
  const trimmedBase = base.replace(/\/+$/, '');
  const path = parts
    .map((part) => part.replace(/^\/+|\/+$/g, ''))
    .filter(Boolean)
    .join('/');

  return path ? `${trimmedBase}/${path}` : trimmedBase;
};
