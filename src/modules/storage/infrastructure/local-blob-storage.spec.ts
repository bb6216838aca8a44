import { writeFileSync } from 'node:fs';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { StorageError } from '../../../common/errors/domain.errors';
import { LocalBlobStorage } from './local-blob-storage';

jest.mock('node:fs/promises', () => {
  const actual = jest.requireActual<typeof import('node:fs/promises')>('node:fs/promises');
  return { ...actual, writeFile: jest.fn(actual.writeFile) };
});

const diskFull = () =>
  Object.assign(new Error('ENOSPC: no space left on device, write'), { code: 'ENOSPC' });

describe('LocalBlobStorage', () => {
  let root: string;
  let storage: LocalBlobStorage;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'gallery-blobs-'));
    storage = new LocalBlobStorage({
      root,
      publicBaseUrl: 'https://cdn.example.test/media/',
    });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('writes blobs under a per-character directory', async () => {
    await storage.write('char42/1-a.png', Buffer.from('png-bytes'), 'image/png');

    await expect(readFile(join(root, 'char42', '1-a.png'), 'utf8')).resolves.toBe('png-bytes');
    await expect(storage.read('char42/1-a.png')).resolves.toEqual(Buffer.from('png-bytes'));
  });

  it('refuses to overwrite an existing blob', async () => {
    await storage.write('char42/1-a.png', Buffer.from('first'), 'image/png');

    await expect(
      storage.write('char42/1-a.png', Buffer.from('second'), 'image/png'),
    ).rejects.toBeInstanceOf(StorageError);
    await expect(readFile(join(root, 'char42', '1-a.png'), 'utf8')).resolves.toBe('first');
  });

  it('removes a partially written blob when the write fails', async () => {
    jest.mocked(writeFile).mockImplementationOnce(async (file) => {
      if (typeof file === 'string') {
        writeFileSync(file, 'trunc');
      }
      throw diskFull();
    });

    const write = storage.write('char42/1-a.png', Buffer.from('png-bytes'), 'image/png');

    await expect(write).rejects.toBeInstanceOf(StorageError);
    await expect(write).rejects.toMatchObject({ operation: 'write', path: 'char42/1-a.png' });
    await expect(readdir(join(root, 'char42'))).resolves.toEqual([]);
  });

  it('reports whether a delete removed anything', async () => {
    await storage.write('char42/1-a.png', Buffer.from('bytes'), 'image/png');

    await expect(storage.delete('char42/1-a.png')).resolves.toBe(true);
    await expect(storage.delete('char42/1-a.png')).resolves.toBe(false);
    await expect(storage.read('char42/1-a.png')).resolves.toBeNull();
  });

  it('rejects paths that escape the root', async () => {
    await expect(
      storage.write('../outside.png', Buffer.from('x'), 'image/png'),
    ).rejects.toMatchObject({ operation: 'write', path: '../outside.png' });
    await expect(storage.delete('../outside.png')).rejects.toBeInstanceOf(StorageError);
    await expect(storage.read('../outside.png')).resolves.toBeNull();
  });

  it('builds public urls from the base url', () => {
    expect(storage.urlFor('char42/1-a.png')).toBe(
      'https://cdn.example.test/media/char42/1-a.png',
    );
  });
});
