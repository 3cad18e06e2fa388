import type { UploadedImage } from '../types';
import { InvalidInputError } from './errorHandler';

export const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

export const ALLOWED_CONTENT_TYPES = ['image/png', 'image/jpeg'] as const;

export type AllowedContentType = (typeof ALLOWED_CONTENT_TYPES)[number];

function isAllowedContentType(value: string): value is AllowedContentType {
  return (ALLOWED_CONTENT_TYPES as readonly string[]).includes(value);
}

/**
 * Lower-cases the declared type, drops parameters such as `; charset=...`
 * and folds the non-standard `image/jpg` into `image/jpeg`.
 */
export function normalizeContentType(contentType: string | undefined): string {
  const base = (contentType ?? '').split(';')[0].trim().toLowerCase();
  return base === 'image/jpg' ? 'image/jpeg' : base;
}

export function detectMimeFromMagicBytes(buffer: Buffer): AllowedContentType | 'image/gif' | 'image/webp' | null {
  const hex = buffer.subarray(0, 16).toString('hex');

  if (hex.startsWith('ffd8ff')) {
    return 'image/jpeg';
  }
  if (hex.startsWith('89504e47')) {
    return 'image/png';
  }
  if (hex.startsWith('474946')) {
    return 'image/gif';
  }
  if (hex.startsWith('52494646') && hex.includes('57454250')) {
    return 'image/webp';
  }
  return null;
}

export function formatBytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}

/**
 * Checks an upload against the PNG/JPEG allow-list and the size ceiling.
 * Returns the upload with its content type normalised.
 */
export function validateImageUpload(image: UploadedImage | undefined): UploadedImage {
  if (!image) {
    throw new InvalidInputError('No file uploaded. Send the image in the "file" field.');
  }

  const contentType = normalizeContentType(image.contentType);
  if (!isAllowedContentType(contentType)) {
    throw new InvalidInputError(
      `Unsupported file type "${contentType || 'unknown'}". Allowed types: ${ALLOWED_CONTENT_TYPES.join(', ')}`,
    );
  }

  if (image.size === 0 || image.buffer.length === 0) {
    throw new InvalidInputError('Uploaded file is empty');
  }

  if (image.size > MAX_UPLOAD_BYTES) {
    throw new InvalidInputError(`File too large (${formatBytes(image.size)}). Max: ${formatBytes(MAX_UPLOAD_BYTES)}`);
  }

  return { ...image, contentType };
}

/**
 * Builds the data URI handed to the vision model. The detected type wins
 * over the declared one so a mislabelled JPEG is still sent as a JPEG.
 */
export function toImageDataUri(image: UploadedImage): string {
  const detected = detectMimeFromMagicBytes(image.buffer);
  const mimeType = detected ?? normalizeContentType(image.contentType);
  return `data:${mimeType};base64,${image.buffer.toString('base64')}`;
}
