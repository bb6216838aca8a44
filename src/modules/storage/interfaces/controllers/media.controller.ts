import { Controller, Get, Header, Param, StreamableFile } from '@nestjs/common';
import { BlobManagerService } from '../../application/blob-manager.service';

@Controller('media')
export class MediaController {
  constructor(private readonly blobManager: BlobManagerService) {}

  /**
   * Serves a stored gallery image. Only meaningful for the local driver; object
   * storage URLs point at the bucket directly.
   */
  @Get(':characterId/:filename')
  @Header('Cache-Control', 'public, max-age=31536000, immutable')
  async getMedia(
    @Param('characterId') characterId: string,
    @Param('filename') filename: string,
  ) {
    const blob = await this.blobManager.read(`${characterId}/${filename}`);
    return new StreamableFile(blob.body, {
      type: blob.contentType,
      length: blob.body.length,
    });
  }
}
