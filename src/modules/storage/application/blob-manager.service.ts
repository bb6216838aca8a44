import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { extname } from 'node:path';
import sharp from 'sharp';
import { NotFoundError, ValidationError } from '../../../common/errors/domain.errors';
import { CHARACTER_ID_PATTERN } from '../../characters/domain/entities/character.entity';
import { IBlobStorageToken, type IBlobStorage } from '../domain/blob-storage.interface';
import {
  formatForContentType,
  formatForExtension,
  IMAGE_FORMATS,
  isImageFormat,
  type ImageFormat,
} from '../domain/image-format';

const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;
const STORED_FILENAME_PATTERN = /^[A-Za-z0-9_-]+\.[a-z0-9]+$/;

export interface ValidatedImage {
  format: ImageFormat;
  contentType: string;
  extension: string;
  size: number;
}

export interface StoredBlob {
  filename: string;
  path: string;
  url: string;
  contentType: string;
  size: number;
}

export interface BlobContent {
  body: Buffer;
  contentType: string;
}

@Injectable()
export class BlobManagerService {
  private readonly logger = new Logger(BlobManagerService.name);
  private readonly maxFileSize: number;

  constructor(
    @Inject(IBlobStorageToken)
    private readonly storage: IBlobStorage,
    configService: ConfigService,
  ) {
    this.maxFileSize =
      configService.get<number>('storage.maxFileSize') ?? DEFAULT_MAX_FILE_SIZE;
  }

  get maxBytes() {
    return this.maxFileSize;
  }

  /**
   * Checks size and the actual image signature. The declared content type is
   * only trusted to disagree, never to agree.
   */
  async validate(content: Buffer, declaredContentType?: string): Promise<ValidatedImage> {
    if (!content.length) {
      throw new ValidationError('empty_file', 'Uploaded file is empty');
    }

    if (content.length > this.maxFileSize) {
      throw new ValidationError('file_too_large', 'File is too large', {
        size: content.length,
        maxSize: this.maxFileSize,
      });
    }

    const format = await this.detectFormat(content);
    if (!format) {
      throw new ValidationError(
        'unsupported_format',
        'Unsupported file type; allowed formats are JPEG, PNG, GIF and WebP',
      );
    }

    const declared = formatForContentType(declaredContentType);
    if (declared && declared !== format) {
      throw new ValidationError(
        'content_type_mismatch',
        'Declared content type does not match the file contents',
        { declared: declaredContentType, detected: IMAGE_FORMATS[format].contentType },
      );
    }

    return {
      format,
      contentType: IMAGE_FORMATS[format].contentType,
      extension: IMAGE_FORMATS[format].extensions[0],
      size: content.length,
    };
  }

  async store(
    characterId: string,
    originalFilename: string,
    content: Buffer,
    declaredContentType?: string,
  ): Promise<StoredBlob> {
    if (!CHARACTER_ID_PATTERN.test(characterId)) {
      throw new ValidationError('invalid_entity_id', 'Invalid character id');
    }

    const image = await this.validate(content, declaredContentType);

    // Keep the client's extension only when it is a spelling of the detected format
    const originalExtension = extname(originalFilename || '').replace('.', '').toLowerCase();
    const extension =
      formatForExtension(originalExtension) === image.format
        ? originalExtension
        : image.extension;

    const filename = `${Date.now()}-${randomUUID()}.${extension}`;
    const path = `${characterId}/${filename}`;
    await this.storage.write(path, content, image.contentType);

    this.logger.debug(`Stored ${path} (${image.size} bytes, ${image.contentType})`);

    return {
      filename,
      path,
      url: this.storage.urlFor(path),
      contentType: image.contentType,
      size: image.size,
    };
  }

  async delete(path: string): Promise<boolean> {
    return this.storage.delete(path);
  }

  async read(path: string): Promise<BlobContent> {
    const [characterId, filename, ...rest] = path.split('/');
    const format = filename ? formatForExtension(extname(filename)) : null;
    if (
      rest.length > 0 ||
      !CHARACTER_ID_PATTERN.test(characterId) ||
      !filename ||
      !STORED_FILENAME_PATTERN.test(filename) ||
      !format
    ) {
      throw new NotFoundError('Image not found');
    }

    const body = await this.storage.read(path);
    if (!body) {
      throw new NotFoundError('Image not found');
    }

    return { body, contentType: IMAGE_FORMATS[format].contentType };
  }

  private async detectFormat(content: Buffer): Promise<ImageFormat | null> {
    try {
      const { format } = await sharp(content).metadata();
      return isImageFormat(format) ? format : null;
    } catch (error) {
      this.logger.debug(
        `Rejected unreadable upload: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }
}
