import fs from 'fs/promises';
import path from 'path';
import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { config } from '@/config/config';
import { logger } from '@/utils/logger';
import { ApiError } from '@/utils/ApiError';

export const COMMUNITY_UPLOADS = 'communities';

const storage = multer.diskStorage({
  destination: path.join(config.uploadDir, COMMUNITY_UPLOADS),
  filename: (req, file, cb) => {
    cb(null, `${randomUUID()}${path.extname(file.originalname).toLowerCase()}`);
  }
});

const upload = multer({
  storage,
  limits: {
    fileSize: config.maxFileSize
  },
  fileFilter: (req, file, cb) => {
    if (file.mimetype.startsWith('image/')) {
      cb(null, true);
    } else {
      cb(ApiError.invalidField(file.fieldname, 'Only image files are allowed.'));
    }
  }
});

export const communityImages = upload.fields([
  { name: 'avatar', maxCount: 1 },
  { name: 'cover', maxCount: 1 }
]);

/** Public path of an uploaded community image, if the field carried one. */
export const uploadedImagePath = (req: Request, field: string): string | undefined => {
  const files = req.files;
  if (!files || Array.isArray(files)) {
    return undefined;
  }

  const file = files[field]?.[0];
  return file ? `/uploads/${COMMUNITY_UPLOADS}/${file.filename}` : undefined;
};

const uploadedFiles = (req: Request): Express.Multer.File[] => {
  const files = req.files;
  if (!files) {
    return [];
  }
  return Array.isArray(files) ? files : Object.values(files).flat();
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/** Error middleware: removes the files a failed request stored, then passes the error on. */
export const discardUploads = async (error: Error, req: Request, res: Response, next: NextFunction) => {
  await Promise.all(
    uploadedFiles(req).map(async (file) => {
      try {
        await fs.unlink(file.path);
      } catch (unlinkError) {
        // multer removes its own files when the upload itself fails
        if (!isMissingFile(unlinkError)) {
          logger.warn(`Could not remove upload ${file.path}: ${String(unlinkError)}`);
        }
      }
    })
  );
  next(error);
};
