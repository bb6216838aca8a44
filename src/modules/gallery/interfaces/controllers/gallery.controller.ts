import {
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Req,
  UseGuards,
} from '@nestjs/common';
import type { FastifyRequest } from 'fastify';
import type { Multipart, MultipartFile } from '@fastify/multipart';
import { ValidationError } from '../../../../common/errors/domain.errors';
import type { Principal } from '../../../auth/domain/principal';
import { CurrentPrincipal } from '../../../auth/interfaces/decorators/current-principal.decorator';
import { PrincipalGuard } from '../../../auth/interfaces/guards/principal.guard';
import { GalleryService, type UploadSource } from '../../application/gallery.service';
import { toImageResponse } from '../dto/image-response.dto';
import { ParseImageIdPipe } from '../pipes/parse-image-id.pipe';

const readTextField = (field: Multipart | Multipart[] | undefined) => {
  const part = Array.isArray(field) ? field[0] : field;
  if (!part || part.type !== 'field') {
    return undefined;
  }
  return typeof part.value === 'string' ? part.value : undefined;
};

const isFileTooLarge = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'FST_REQ_FILE_TOO_LARGE';

const toUploadSource = (file: MultipartFile): UploadSource => ({
  filename: file.filename,
  mimeType: file.mimetype,
  read: async () => {
    try {
      return await file.toBuffer();
    } catch (error) {
      if (isFileTooLarge(error)) {
        throw new ValidationError('file_too_large', 'File is too large');
      }
      throw error;
    }
  },
});

@Controller('characters/:characterId/gallery')
export class GalleryController {
  constructor(private readonly galleryService: GalleryService) {}

  @Get()
  async listImages(@Param('characterId') characterId: string) {
    const images = await this.galleryService.listImages(characterId);
    return images.map(toImageResponse);
  }

  /**
   * multipart/form-data with a `caption` field followed by one `file` part
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  @UseGuards(PrincipalGuard)
  async uploadImage(
    @Param('characterId') characterId: string,
    @Req() req: FastifyRequest,
    @CurrentPrincipal() principal: Principal | null,
  ) {
    const file = req.isMultipart() ? await req.file() : undefined;
    const caption = readTextField(file?.fields.caption);

    const record = await this.galleryService.uploadImage(
      characterId,
      principal,
      file ? toUploadSource(file) : null,
      caption,
    );
    return toImageResponse(record);
  }

  @Delete(':imageId')
  @UseGuards(PrincipalGuard)
  async deleteImage(
    @Param('characterId') characterId: string,
    @Param('imageId', ParseImageIdPipe) imageId: number,
    @CurrentPrincipal() principal: Principal | null,
  ) {
    const removed = await this.galleryService.deleteImage(characterId, principal, imageId);
    return { removed };
  }
}
