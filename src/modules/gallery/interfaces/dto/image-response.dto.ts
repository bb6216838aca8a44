import type { ImageRecord } from '../../domain/entities/image-record.entity';

export interface ImageResponseDto {
  id: number;
  filename: string;
  path: string;
  url: string;
  caption: string | null;
  uploadedAt: string;
}

export const toImageResponse = (record: ImageRecord): ImageResponseDto => ({
  id: record.id,
  filename: record.filename,
  path: record.path,
  url: record.url,
  caption: record.caption,
  uploadedAt: record.uploadedAt.toISOString(),
});
