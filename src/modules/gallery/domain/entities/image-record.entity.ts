export const GALLERY_ATTRIBUTE_KEY = 'gallery';

export interface ImageRecord {
  id: number;
  filename: string;
  path: string;
  url: string;
  caption: string | null;
  uploadedAt: Date;
}

/** Shape persisted verbatim, in display order, under the `gallery` attribute. */
export interface StoredImageRecord {
  id: number;
  filename: string;
  path: string;
  url: string;
  caption: string | null;
  uploaded_at: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export function isStoredImageRecord(value: unknown): value is StoredImageRecord {
  return (
    isRecord(value) &&
    Number.isInteger(value.id) &&
    typeof value.filename === 'string' &&
    typeof value.path === 'string' &&
    typeof value.url === 'string' &&
    (value.caption === null || typeof value.caption === 'string') &&
    typeof value.uploaded_at === 'string' &&
    !Number.isNaN(Date.parse(value.uploaded_at))
  );
}

export function storedToImageRecord(stored: StoredImageRecord): ImageRecord {
  return {
    id: stored.id,
    filename: stored.filename,
    path: stored.path,
    url: stored.url,
    caption: stored.caption,
    uploadedAt: new Date(stored.uploaded_at),
  };
}

export function imageRecordToStored(record: ImageRecord): StoredImageRecord {
  return {
    id: record.id,
    filename: record.filename,
    path: record.path,
    url: record.url,
    caption: record.caption,
    uploaded_at: record.uploadedAt.toISOString(),
  };
}
