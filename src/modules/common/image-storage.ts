import { BadRequestException, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { mkdirSync, promises as fs } from 'fs';
import { extname, resolve, sep } from 'path';
import { UPLOADS_ROUTE_PREFIX } from './upload.constants';

const SAFE_EXTENSION = /^\.[a-z0-9]{1,10}$/;

export function getImageExtension(originalName: string) {
  const extension = extname(originalName).toLowerCase();
  return SAFE_EXTENSION.test(extension) ? extension : '';
}

export function buildImageFileName(extension: string) {
  return `${randomUUID()}${extension}`;
}

export function buildImageRelativePath(fileName: string) {
  return `${UPLOADS_ROUTE_PREFIX}/${fileName}`;
}

function resolveInside(uploadsDir: string, fileName: string) {
  const baseDir = resolve(uploadsDir);
  const target = resolve(baseDir, fileName);
  return target.startsWith(`${baseDir}${sep}`) ? target : null;
}

export function resolveImageFilePath(uploadsDir: string, fileName: string) {
  const target = resolveInside(uploadsDir, fileName);
  if (!target) {
    throw new BadRequestException('Invalid image path');
  }
  return target;
}

/** Maps a stored `/uploads/<file>` value back to disk; null if it points anywhere else. */
export function resolveStoredImagePath(uploadsDir: string, relativePath: string) {
  const prefix = `${UPLOADS_ROUTE_PREFIX}/`;
  if (!relativePath.startsWith(prefix)) {
    return null;
  }
  return resolveInside(uploadsDir, relativePath.slice(prefix.length));
}

export async function removeImageFile(filePath: string) {
  await fs.rm(filePath, { force: true });
}

/**
 * Fire-and-forget removal of a product image. Failures leave an orphaned file
 * behind and are only logged.
 */
export function removeImageQuietly(uploadsDir: string, relativePath: string, logger: Logger) {
  if (!relativePath) {
    return;
  }
  const filePath = resolveStoredImagePath(uploadsDir, relativePath);
  if (!filePath) {
    logger.warn(`Refusing to remove image outside uploads directory: ${relativePath}`);
    return;
  }
  void removeImageFile(filePath).catch((error: unknown) => {
    logger.warn(`Failed to remove image ${filePath}: ${String(error)}`);
  });
}

export function ensureUploadsDir(uploadsDir: string) {
  mkdirSync(uploadsDir, { recursive: true });
}
