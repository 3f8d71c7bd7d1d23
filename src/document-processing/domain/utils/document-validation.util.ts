import { extname } from 'path';
import { DocumentValidationError } from '../errors/document-processing.error';

const PDF_EXTENSION = '.pdf';

const CONTENT_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

/**
 * Lowercased extension including the dot, or '' when there is none.
 */
export function getFileExtension(fileName: string): string {
  return extname(fileName).toLowerCase();
}

export function isPdf(fileName: string): boolean {
  return getFileExtension(fileName) === PDF_EXTENSION;
}

/**
 * Content type stored with the object. The client-declared MIME type is
 * used only when the extension is unknown here.
 */
export function resolveContentType(
  fileName: string,
  declaredMimeType?: string,
): string {
  return (
    CONTENT_TYPES[getFileExtension(fileName)] ||
    declaredMimeType ||
    'application/octet-stream'
  );
}

/**
 * Multer decodes multipart filenames as latin1; re-read those bytes as
 * UTF-8. A name that is already wider than latin1, or whose bytes are not
 * valid UTF-8, is returned as received.
 */
export function decodeUploadFileName(originalName: string): string {
  if (/[^\u0000-\u00ff]/.test(originalName)) {
    return originalName;
  }
  const decoded = Buffer.from(originalName, 'latin1').toString('utf8');
  return decoded.includes('\ufffd') ? originalName : decoded;
}

/**
 * Checks an upload before any I/O happens.
 *
 * @throws DocumentValidationError
 */
export function validateUpload(
  fileName: string,
  fileBuffer: Buffer,
  allowedExtensions: readonly string[],
): void {
  if (!fileName || fileName.trim().length === 0) {
    throw new DocumentValidationError('File name is required');
  }

  if (/[\\/]/.test(fileName) || fileName === '.' || fileName === '..') {
    throw new DocumentValidationError('File name must not contain a path');
  }

  const extension = getFileExtension(fileName);
  if (!allowedExtensions.includes(extension)) {
    throw new DocumentValidationError(
      `Invalid file type. Allowed extensions: ${allowedExtensions.join(', ')}`,
    );
  }

  if (fileBuffer.length === 0) {
    throw new DocumentValidationError('File is empty');
  }
}
