import { Inject, Injectable, Logger } from '@nestjs/common';
import { ValidationError } from '../../../common/errors/domain.errors';
import { KeyedMutex } from '../../../common/utils/keyed-mutex';
import {
  ICharacterAttributesRepositoryToken,
  type ICharacterAttributesRepository,
} from '../../characters/domain/character-attributes.repository.interface';
import {
  GALLERY_ATTRIBUTE_KEY,
  imageRecordToStored,
  isStoredImageRecord,
  storedToImageRecord,
  type ImageRecord,
} from '../domain/entities/image-record.entity';

export interface NewImage {
  filename: string;
  path: string;
  url: string;
  caption?: string | null;
}

export type RemoveImageResult =
  | { removed: false }
  | { removed: true; record: ImageRecord };

/**
 * Owns the `gallery` attribute of each character: an ordered list of image
 * records, oldest first. Knows nothing about file bytes.
 */
@Injectable()
export class GalleryStoreService {
  private readonly logger = new Logger(GalleryStoreService.name);
  private readonly mutex = new KeyedMutex();

  constructor(
    @Inject(ICharacterAttributesRepositoryToken)
    private readonly attributesRepository: ICharacterAttributesRepository,
  ) {}

  async listImages(characterId: string): Promise<ImageRecord[]> {
    return this.readGallery(characterId);
  }

  async addImage(characterId: string, image: NewImage): Promise<ImageRecord> {
    if (!image.filename.trim()) {
      throw new ValidationError('missing_filename', 'Image filename is required');
    }
    if (!image.path.trim()) {
      throw new ValidationError('missing_path', 'Image path is required');
    }

    return this.mutex.runExclusive(characterId, async () => {
      const gallery = await this.readGallery(characterId);
      const record: ImageRecord = {
        id: gallery.reduce((max, item) => Math.max(max, item.id), 0) + 1,
        filename: image.filename,
        path: image.path,
        url: image.url,
        caption: image.caption?.trim() || null,
        uploadedAt: new Date(),
      };

      await this.writeGallery(characterId, [...gallery, record]);
      this.logger.log(`Added image ${record.id} to gallery of ${characterId}`);
      return record;
    });
  }

  async removeImage(characterId: string, imageId: number): Promise<RemoveImageResult> {
    return this.mutex.runExclusive(characterId, async () => {
      const gallery = await this.readGallery(characterId);
      const record = gallery.find((item) => item.id === imageId);
      if (!record) {
        return { removed: false };
      }

      await this.writeGallery(
        characterId,
        gallery.filter((item) => item.id !== imageId),
      );
      this.logger.log(`Removed image ${imageId} from gallery of ${characterId}`);
      return { removed: true, record };
    });
  }

  private async readGallery(characterId: string): Promise<ImageRecord[]> {
    const value = await this.attributesRepository.getAttribute(
      characterId,
      GALLERY_ATTRIBUTE_KEY,
    );
    if (value === undefined || value === null) {
      return [];
    }
    if (!Array.isArray(value)) {
      this.logger.warn(`Ignoring non-list gallery attribute on ${characterId}`);
      return [];
    }

    const records = value.filter(isStoredImageRecord);
    if (records.length !== value.length) {
      this.logger.warn(
        `Skipped ${value.length - records.length} malformed gallery entries on ${characterId}`,
      );
    }
    return records.map(storedToImageRecord);
  }

  private async writeGallery(characterId: string, gallery: ImageRecord[]) {
    await this.attributesRepository.setAttribute(
      characterId,
      GALLERY_ATTRIBUTE_KEY,
      gallery.map(imageRecordToStored),
    );
  }
}
