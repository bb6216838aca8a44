import { StorageError } from '../../../common/errors/domain.errors';
import { joinUrl, type IBlobStorage } from '../domain/blob-storage.interface';

export class InMemoryBlobStorage implements IBlobStorage {
  readonly blobs = new Map<string, { body: Buffer; contentType: string }>();
  failWrites = false;
  failDeletes = false;

  async write(path: string, body: Buffer, contentType: string): Promise<void> {
    if (this.failWrites) {
      throw new StorageError('write', path, new Error('ENOSPC: no space left on device'));
    }
    this.blobs.set(path, { body: Buffer.from(body), contentType });
  }

  async delete(path: string): Promise<boolean> {
    if (this.failDeletes) {
      throw new StorageError('delete', path, new Error('EACCES: permission denied'));
    }
    return this.blobs.delete(path);
  }

  async read(path: string): Promise<Buffer | null> {
    return this.blobs.get(path)?.body ?? null;
  }

  urlFor(path: string): string {
    return joinUrl('http://localhost:3001/api/media', path);
  }
}
