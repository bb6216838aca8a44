import { Injectable, Logger } from '@nestjs/common';
import {
  describeError,
  PermissionError,
  StorageError,
  ValidationError,
} from '../../../common/errors/domain.errors';
import type { Principal } from '../../auth/domain/principal';
import { CharactersService } from '../../characters/application/characters.service';
import { BlobManagerService } from '../../storage/application/blob-manager.service';
import type { ImageRecord } from '../domain/entities/image-record.entity';
import { authorizeGalleryAction, type GalleryAction } from './gallery-policy';
import { GalleryStoreService } from './gallery-store.service';

export const MAX_CAPTION_LENGTH = 500;

/**
 * A file part whose bytes are only pulled once the caller is authorized.
 */
export interface UploadSource {
  filename: string;
  mimeType?: string;
  read(): Promise<Buffer>;
}

@Injectable()
export class GalleryService {
  private readonly logger = new Logger(GalleryService.name);

  constructor(
    private readonly charactersService: CharactersService,
    private readonly galleryStore: GalleryStoreService,
    private readonly blobManager: BlobManagerService,
  ) {}

  async listImages(characterId: string): Promise<ImageRecord[]> {
    return this.galleryStore.listImages(characterId);
  }

  /**
   * validate → store blob → record metadata. A blob whose record could not
   * be written is deleted again before the error propagates.
   */
  async uploadImage(
    characterId: string,
    principal: Principal | null,
    file: UploadSource | null,
    caption?: string | null,
  ): Promise<ImageRecord> {
    await this.authorize(characterId, principal, 'upload');

    if (!file) {
      throw new ValidationError('missing_file', 'File is required');
    }

    if (caption && caption.trim().length > MAX_CAPTION_LENGTH) {
      throw new ValidationError(
        'caption_too_long',
        `Caption must be at most ${MAX_CAPTION_LENGTH} characters`,
      );
    }

    const content = await file.read();
    const blob = await this.blobManager.store(
      characterId,
      file.filename,
      content,
      file.mimeType,
    );

    try {
      return await this.galleryStore.addImage(characterId, {
        filename: blob.filename,
        path: blob.path,
        url: blob.url,
        caption,
      });
    } catch (error) {
      await this.discardBlob(blob.path, error);
      throw error;
    }
  }

  /**
   * Removes the record first, then its blob. The record stays removed even
   * when the blob cannot be deleted.
   */
  async deleteImage(
    characterId: string,
    principal: Principal | null,
    imageId: number,
  ): Promise<boolean> {
    await this.authorize(characterId, principal, 'delete');

    const result = await this.galleryStore.removeImage(characterId, imageId);
    if (!result.removed) {
      return false;
    }

    const { path } = result.record;
    try {
      const deleted = await this.blobManager.delete(path);
      if (!deleted) {
        this.logger.warn(`Blob ${path} for image ${imageId} was already gone`);
      }
    } catch (error) {
      this.logger.error(
        `Orphaned blob ${path} after removing image ${imageId} from ${characterId}: ${describeError(error)}`,
      );
      throw error;
    }

    return true;
  }

  private async authorize(
    characterId: string,
    principal: Principal | null,
    action: GalleryAction,
  ): Promise<void> {
    const character = await this.charactersService.getCharacter(characterId);
    if (!authorizeGalleryAction(principal, character, action)) {
      throw new PermissionError();
    }
  }

  private async discardBlob(path: string, cause: unknown) {
    try {
      await this.blobManager.delete(path);
    } catch (error) {
      const reason = error instanceof StorageError ? describeError(error.cause) : describeError(error);
      this.logger.error(`Orphaned blob ${path} after failed upload (${describeError(cause)}): ${reason}`);
    }
  }
}
