import { ConfigService } from '@nestjs/config';
import {
  NotFoundError,
  PermissionError,
  StorageError,
  ValidationError,
} from '../../../common/errors/domain.errors';
import type { Principal } from '../../auth/domain/principal';
import { CharactersService } from '../../characters/application/characters.service';
import {
  buildCharacterRow,
  InMemoryCharacterAttributesRepository,
  InMemoryCharactersRepository,
} from '../../characters/testing/in-memory-characters.repository';
import { BlobManagerService } from '../../storage/application/blob-manager.service';
import { createImage } from '../../storage/testing/image-fixtures';
import { InMemoryBlobStorage } from '../../storage/testing/in-memory-blob-storage';
import { GalleryStoreService } from './gallery-store.service';
import { GalleryService, type UploadSource } from './gallery.service';

const owner: Principal = { id: 'user-7', role: 'regular' };
const stranger: Principal = { id: 'user-8', role: 'regular' };
const staff: Principal = { id: 'gm-1', role: 'staff' };

const upload = (filename: string, content: Buffer, mimeType?: string) => {
  const read = jest.fn(async () => content);
  const source: UploadSource = { filename, mimeType, read };
  return { source, read };
};

describe('GalleryService', () => {
  let attributes: InMemoryCharacterAttributesRepository;
  let storage: InMemoryBlobStorage;
  let galleryStore: GalleryStoreService;
  let gallery: GalleryService;
  let jpeg: Buffer;
  let png: Buffer;

  beforeAll(async () => {
    jpeg = await createImage('jpeg');
    png = await createImage('png');
  });

  const setup = (maxFileSize = 5 * 1024 * 1024) => {
    const characters = new InMemoryCharactersRepository([
      buildCharacterRow({ id: 'char42', key: 'Talia', owner_id: 'user-7' }),
    ]);
    attributes = new InMemoryCharacterAttributesRepository();
    storage = new InMemoryBlobStorage();
    galleryStore = new GalleryStoreService(attributes);
    gallery = new GalleryService(
      new CharactersService(characters, attributes),
      galleryStore,
      new BlobManagerService(storage, new ConfigService({ storage: { maxFileSize } })),
    );
  };

  beforeEach(() => setup());

  it('runs an owner and staff through upload, listing and deletion', async () => {
    const first = await gallery.uploadImage('char42', owner, upload('photo.jpg', jpeg).source);

    expect(first.id).toBe(1);
    expect(first.filename).not.toBe('photo.jpg');
    expect(first.filename).toMatch(/^\d+-[0-9a-f-]{36}\.jpg$/);
    expect(first.path).toBe(`char42/${first.filename}`);
    expect(first.url).toBe(`http://localhost:3001/api/media/char42/${first.filename}`);
    expect(storage.blobs.has(first.path)).toBe(true);

    const second = await gallery.uploadImage(
      'char42',
      staff,
      upload('portrait.png', png, 'image/png').source,
      'Court portrait',
    );
    expect(second).toMatchObject({ id: 2, caption: 'Court portrait' });

    const listed = await gallery.listImages('char42');
    expect(listed.map((record) => record.id)).toEqual([1, 2]);

    await expect(gallery.deleteImage('char42', stranger, 1)).rejects.toBeInstanceOf(
      PermissionError,
    );
    await expect(gallery.listImages('char42')).resolves.toHaveLength(2);

    await expect(gallery.deleteImage('char42', owner, 1)).resolves.toBe(true);
    expect(storage.blobs.has(first.path)).toBe(false);
    const remaining = await gallery.listImages('char42');
    expect(remaining.map((record) => record.id)).toEqual([2]);
  });

  describe('uploadImage', () => {
    it('refuses other players before reading the file', async () => {
      const { source, read } = upload('photo.jpg', jpeg);

      await expect(gallery.uploadImage('char42', stranger, source)).rejects.toBeInstanceOf(
        PermissionError,
      );
      expect(read).not.toHaveBeenCalled();
      expect(storage.blobs.size).toBe(0);
      await expect(gallery.listImages('char42')).resolves.toEqual([]);
    });

    it('refuses anonymous callers', async () => {
      await expect(
        gallery.uploadImage('char42', null, upload('photo.jpg', jpeg).source),
      ).rejects.toBeInstanceOf(PermissionError);
    });

    it('checks permission even when no file was sent', async () => {
      await expect(gallery.uploadImage('char42', stranger, null)).rejects.toBeInstanceOf(
        PermissionError,
      );
      await expect(gallery.uploadImage('char42', owner, null)).rejects.toMatchObject({
        reason: 'missing_file',
      });
    });

    it('reports an unknown character as not found', async () => {
      await expect(
        gallery.uploadImage('ghost', staff, upload('photo.jpg', jpeg).source),
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('rejects long captions before storing anything', async () => {
      const { source, read } = upload('photo.jpg', jpeg);

      await expect(
        gallery.uploadImage('char42', owner, source, 'x'.repeat(501)),
      ).rejects.toMatchObject({ reason: 'caption_too_long' });
      expect(read).not.toHaveBeenCalled();
      expect(storage.blobs.size).toBe(0);
    });

    it('accepts a caption of exactly 500 characters', async () => {
      const record = await gallery.uploadImage(
        'char42',
        owner,
        upload('photo.jpg', jpeg).source,
        'x'.repeat(500),
      );
      expect(record.caption).toHaveLength(500);
    });

    it('leaves no blob or record behind for an oversized file', async () => {
      setup(64);

      await expect(
        gallery.uploadImage('char42', owner, upload('big.png', Buffer.alloc(65, 0xff)).source),
      ).rejects.toMatchObject({ reason: 'file_too_large' });
      expect(storage.blobs.size).toBe(0);
      expect(attributes.writes).toBe(0);
    });

    it('leaves no record behind for a non-image', async () => {
      await expect(
        gallery.uploadImage('char42', owner, upload('notes.png', Buffer.from('plain text')).source),
      ).rejects.toBeInstanceOf(ValidationError);
      expect(attributes.writes).toBe(0);
    });

    it('records nothing when the blob cannot be written', async () => {
      storage.failWrites = true;

      await expect(
        gallery.uploadImage('char42', owner, upload('photo.jpg', jpeg).source),
      ).rejects.toBeInstanceOf(StorageError);
      await expect(gallery.listImages('char42')).resolves.toEqual([]);
    });

    it('deletes the stored blob when the record cannot be written', async () => {
      jest.spyOn(galleryStore, 'addImage').mockRejectedValue(new Error('connection reset'));

      await expect(
        gallery.uploadImage('char42', owner, upload('photo.jpg', jpeg).source),
      ).rejects.toThrow('connection reset');
      expect(storage.blobs.size).toBe(0);
    });

    it('rethrows the original error when the compensating delete also fails', async () => {
      jest.spyOn(galleryStore, 'addImage').mockRejectedValue(new Error('connection reset'));
      storage.failDeletes = true;

      await expect(
        gallery.uploadImage('char42', owner, upload('photo.jpg', jpeg).source),
      ).rejects.toThrow('connection reset');
      expect(storage.blobs.size).toBe(1);
    });
  });

  describe('deleteImage', () => {
    it('returns false for an image that is not in the gallery', async () => {
      await expect(gallery.deleteImage('char42', owner, 9)).resolves.toBe(false);
    });

    it('reports an unknown character as not found', async () => {
      await expect(gallery.deleteImage('ghost', staff, 1)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('removes the record even when the blob is already gone', async () => {
      const record = await gallery.uploadImage('char42', owner, upload('photo.jpg', jpeg).source);
      storage.blobs.delete(record.path);

      await expect(gallery.deleteImage('char42', owner, record.id)).resolves.toBe(true);
      await expect(gallery.listImages('char42')).resolves.toEqual([]);
    });

    it('keeps the record removed and propagates a blob delete failure', async () => {
      const record = await gallery.uploadImage('char42', staff, upload('photo.jpg', jpeg).source);
      storage.failDeletes = true;

      await expect(gallery.deleteImage('char42', staff, record.id)).rejects.toMatchObject({
        operation: 'delete',
        path: record.path,
      });
      await expect(gallery.listImages('char42')).resolves.toEqual([]);
      expect(storage.blobs.has(record.path)).toBe(true);
    });
  });

  it('lists an empty gallery for an unknown character', async () => {
    await expect(gallery.listImages('ghost')).resolves.toEqual([]);
  });
});
