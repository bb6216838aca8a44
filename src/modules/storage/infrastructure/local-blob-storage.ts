import { Logger } from '@nestjs/common';
import { mkdir, readFile, unlink, writeFile } from 'node:fs/promises';
import { dirname, resolve, sep } from 'node:path';
import { StorageError } from '../../../common/errors/domain.errors';
import { joinUrl, type IBlobStorage } from '../domain/blob-storage.interface';

export interface LocalBlobStorageOptions {
  root: string;
  publicBaseUrl: string;
}

const errorCode = (error: unknown) =>
  error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

export class LocalBlobStorage implements IBlobStorage {
  private readonly logger = new Logger(LocalBlobStorage.name);
  private readonly root: string;

  constructor(private readonly options: LocalBlobStorageOptions) {
    this.root = resolve(options.root);
  }

  async write(path: string, body: Buffer, _contentType: string): Promise<void> {
    const target = this.resolvePath(path, 'write');
    try {
      await mkdir(dirname(target), { recursive: true });
      // 'wx' refuses to overwrite, so a name collision can never clobber a blob
      await writeFile(target, body, { flag: 'wx' });
    } catch (error) {
      this.logger.error(`Failed to write blob ${path}: ${errorCode(error) ?? error}`);
      if (errorCode(error) !== 'EEXIST') {
        await this.removePartial(target, path);
      }
      throw new StorageError('write', path, error);
    }
  }

  async delete(path: string): Promise<boolean> {
    const target = this.resolvePath(path, 'delete');
    try {
      await unlink(target);
      return true;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return false;
      }
      throw new StorageError('delete', path, error);
    }
  }

  async read(path: string): Promise<Buffer | null> {
    if (!this.isInsideRoot(path)) {
      return null;
    }
    const target = this.resolvePath(path, 'read');
    try {
      return await readFile(target);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      throw new StorageError('read', path, error);
    }
  }

  urlFor(path: string): string {
    return joinUrl(this.options.publicBaseUrl, path);
  }

  private isInsideRoot(path: string) {
    return resolve(this.root, path).startsWith(`${this.root}${sep}`);
  }

  private resolvePath(path: string, operation: StorageError['operation']) {
    if (!this.isInsideRoot(path)) {
      throw new StorageError(
        operation,
        path,
        new Error(`Blob path escapes the storage root: ${path}`),
      );
    }
    return resolve(this.root, path);
  }

  /** Drops whatever a failed write left behind; the file was created by that write. */
  private async removePartial(target: string, path: string) {
    try {
      await unlink(target);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        this.logger.error(`Orphaned partial blob ${path}: ${errorCode(error) ?? error}`);
      }
    }
  }
}
