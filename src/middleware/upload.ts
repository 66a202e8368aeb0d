import multer from 'multer';
import { InvalidUploadError } from '../utils/errors';

export const ALLOWED_CONTENT_TYPES: readonly string[] = [
  'audio/wav',
  'audio/x-wav',
  'audio/wave',
  'audio/mpeg',
  'audio/mp3',
  'video/mp4',
  'audio/mp4',
  'audio/x-m4a',
];

/**
 * Reject an upload before anything is written or allocated.
 */
export function assertAcceptableUpload(filename: string | undefined, contentType: string | undefined): void {
  if (!filename) {
    throw new InvalidUploadError('Filename is missing.');
  }
  if (!contentType || !ALLOWED_CONTENT_TYPES.includes(contentType)) {
    throw new InvalidUploadError(
      `Unsupported file type: ${contentType ?? 'unknown'}. Supported types are mp4, m4a, mp3, wav.`
    );
  }
}

/**
 * Multer instance keeping the upload in memory; the pipeline writes its own
 * uniquely named copy.
 */
export function createAudioUpload(maxFileSize: number): multer.Multer {
  return multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxFileSize,
      files: 1,
    },
    fileFilter: (req, file, cb) => {
      try {
        assertAcceptableUpload(file.originalname, file.mimetype);
        cb(null, true);
      } catch (err) {
        cb(err instanceof Error ? err : new Error(String(err)));
      }
    },
  });
}
