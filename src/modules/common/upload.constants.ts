export const DEFAULT_UPLOADS_DIR = './uploads';
export const UPLOADS_ROUTE_PREFIX = '/uploads';

export const MAX_IMAGE_BYTES = 8 * 1024 * 1024;
export const IMAGE_FIELD_NAME = 'image';

export const IMAGE_MAX_DIMENSION = 800;
export const JPEG_QUALITY = 80;
// libpng's default level, not the maximum.
export const PNG_COMPRESSION_LEVEL = 6;

export const IMAGE_PROCESSING_TIMEOUT_MS = 10_000;

export const BUFFER_POOL_MAX_RETAINED = 16;
export const BUFFER_POOL_MAX_RETAINED_BYTES = MAX_IMAGE_BYTES;
