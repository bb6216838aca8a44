import sharp from 'sharp';
import type { ImageFormat } from '../domain/image-format';

export const createImage = (format: ImageFormat | 'tiff', size = 8): Promise<Buffer> =>
  sharp({
    create: {
      width: size,
      height: size,
      channels: 3,
      background: { r: 200, g: 80, b: 40 },
    },
  })
    .toFormat(format)
    .toBuffer();

/** A DOS/PE header: what a renamed executable starts with. */
export const fakeExecutable = () =>
  Buffer.concat([Buffer.from('MZ\x90\x00\x03\x00\x00\x00', 'binary'), Buffer.alloc(120, 0)]);
