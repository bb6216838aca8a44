export const IMAGE_FORMATS = {
  jpeg: { contentType: 'image/jpeg', extensions: ['jpg', 'jpeg'] },
  png: { contentType: 'image/png', extensions: ['png'] },
  gif: { contentType: 'image/gif', extensions: ['gif'] },
  webp: { contentType: 'image/webp', extensions: ['webp'] },
} as const;

export type ImageFormat = keyof typeof IMAGE_FORMATS;

const CONTENT_TYPE_ALIASES: Record<string, string> = {
  'image/jpg': 'image/jpeg',
  'image/pjpeg': 'image/jpeg',
};

export const isImageFormat = (value: string | undefined): value is ImageFormat =>
  value !== undefined && Object.prototype.hasOwnProperty.call(IMAGE_FORMATS, value);

export const normalizeContentType = (value: string | undefined) => {
  const base = (value ?? '').split(';')[0].trim().toLowerCase();
  return CONTENT_TYPE_ALIASES[base] ?? base;
};

/** Format claimed by a declared content type, if it names one we accept. */
export const formatForContentType = (value: string | undefined): ImageFormat | null => {
  const contentType = normalizeContentType(value);
  const match = Object.entries(IMAGE_FORMATS).find(
    ([, format]) => format.contentType === contentType,
  );
  return match && isImageFormat(match[0]) ? match[0] : null;
};

export const formatForExtension = (extension: string): ImageFormat | null => {
  const normalized = extension.replace(/^\./, '').toLowerCase();
  const match = Object.entries(IMAGE_FORMATS).find(([, format]) =>
    format.extensions.some((candidate) => candidate === normalized),
  );
  return match && isImageFormat(match[0]) ? match[0] : null;
};
