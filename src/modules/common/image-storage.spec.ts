import { BadRequestException } from '@nestjs/common';
import { join, resolve } from 'path';
import {
  buildImageFileName,
  buildImageRelativePath,
  getImageExtension,
  resolveImageFilePath,
  resolveStoredImagePath,
} from './image-storage';

describe('image storage paths', () => {
  const uploadsDir = '/srv/catalog/uploads';

  it('normalizes the extension of the uploaded file name', () => {
    expect(getImageExtension('Photo.JPG')).toBe('.jpg');
    expect(getImageExtension('archive.tar.png')).toBe('.png');
    expect(getImageExtension('no-extension')).toBe('');
    expect(getImageExtension('odd.$$$')).toBe('');
  });

  it('builds unique file names that keep the extension', () => {
    const first = buildImageFileName('.png');
    const second = buildImageFileName('.png');

    expect(first).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}\.png$/);
    expect(first).not.toBe(second);
  });

  it('stores images under the public uploads prefix', () => {
    expect(buildImageRelativePath('abc.jpg')).toBe('/uploads/abc.jpg');
  });

  it('resolves file names inside the uploads directory', () => {
    expect(resolveImageFilePath(uploadsDir, 'abc.jpg')).toBe(join(resolve(uploadsDir), 'abc.jpg'));
    expect(() => resolveImageFilePath(uploadsDir, '../escape.jpg')).toThrow(BadRequestException);
  });

  it('maps stored paths back to disk and refuses anything else', () => {
    expect(resolveStoredImagePath(uploadsDir, '/uploads/abc.jpg')).toBe(
      join(resolve(uploadsDir), 'abc.jpg'),
    );
    expect(resolveStoredImagePath(uploadsDir, '/uploads/../secret.txt')).toBeNull();
    expect(resolveStoredImagePath(uploadsDir, '/etc/passwd')).toBeNull();
    expect(resolveStoredImagePath(uploadsDir, '/uploads/')).toBeNull();
  });
});
