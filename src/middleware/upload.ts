import type { Request } from 'express';
import multer from 'multer';
import { AppError } from '../common/errors/app-error';
import { decodeBase64Image, isNonEmptyBase64 } from '../common/utils/base64';

export const FACE_IMAGE_FIELD = 'face_image';

// Largest image the matching engine accepts as inline bytes.
export const MAX_FACE_IMAGE_BYTES = 5 * 1024 * 1024;

export const faceImageUpload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: MAX_FACE_IMAGE_BYTES, files: 1 },
}).single(FACE_IMAGE_FIELD);

export function faceImageTooLargeError(): AppError {
  return new AppError(413, 'FACE_IMAGE_TOO_LARGE', `${FACE_IMAGE_FIELD} exceeds ${MAX_FACE_IMAGE_BYTES} bytes`);
}

/**
 * Returns the face image bytes from a multipart upload, or from a base64 / data URL
 * `face_image` field for JSON clients.
 */
export function readFaceImage(req: Request): Buffer {
  let image: Buffer | undefined;

  if (req.file) {
    image = req.file.buffer;
  } else {
    const body: unknown = req.body;
    const encoded = typeof body === 'object' && body !== null && FACE_IMAGE_FIELD in body
      ? body[FACE_IMAGE_FIELD]
      : undefined;
    if (isNonEmptyBase64(encoded)) {
      image = decodeBase64Image(encoded);
    }
  }

  if (image === undefined || image.length === 0) {
    throw new AppError(400, 'FACE_IMAGE_REQUIRED', `${FACE_IMAGE_FIELD} must contain an image`);
  }
  if (image.length > MAX_FACE_IMAGE_BYTES) {
    throw faceImageTooLargeError();
  }
  return image;
}
