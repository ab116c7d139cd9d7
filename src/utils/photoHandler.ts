import { copyFile, mkdir, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { basename, extname, join, resolve } from 'node:path';
import { Jimp, JimpMime } from 'jimp';
import { PHOTO_LIMITS, type PhotoLimits } from '../config/app';
import type { PhotoPaths } from '../types/inspection';
import { InspectionError, StorageError, TooLargeError, UnsupportedFormatError, errorMessage } from './errors';

type JimpImage = Awaited<ReturnType<typeof Jimp.read>>;

export const SUPPORTED_EXTENSIONS: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.bmp': 'image/bmp',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
};

export interface ValidatedPhoto {
  path: string;
  extension: string;
  contentType: string;
  sizeBytes: number;
  width: number;
  height: number;
}

export interface ProcessedPhoto extends PhotoPaths {
  width: number;
  height: number;
  thumbnailWidth: number;
  thumbnailHeight: number;
}

export interface PhotoInfo {
  path: string;
  filename: string;
  contentType: string | null;
  sizeBytes: number;
  sizeMb: number;
  width: number;
  height: number;
  createdAt: string;
  modifiedAt: string;
}

export interface PhotoHandlerOptions {
  uploadsDir: string;
  limits?: Partial<PhotoLimits>;
}

export function recordPhotoDir(uploadsDir: string, recordId: number) {
  return join(uploadsDir, `inspection_${recordId}`);
}

/**
 * Validates uploads and writes the per-record photo set:
 *
 *   <uploads>/inspection_<id>/original.<ext>   untouched copy of the upload
 *   <uploads>/inspection_<id>/photo.jpg        scaled down to the max dimensions
 *   <uploads>/inspection_<id>/thumb.jpg        preview
 *
 * Resize and encode parameters are fixed, so processing the same input
 * twice writes identical files.
 */
export class PhotoHandler {
  readonly uploadsDir: string;
  readonly limits: PhotoLimits;

  constructor(options: PhotoHandlerOptions) {
    this.uploadsDir = options.uploadsDir;
    this.limits = { ...PHOTO_LIMITS, ...options.limits };
  }

  async validate(file: string): Promise<ValidatedPhoto> {
    return (await this.inspect(file)).photo;
  }

  // Validation plus the decoded image, so processing decodes once
  private async inspect(file: string): Promise<{ photo: ValidatedPhoto; image: JimpImage }> {
    const extension = extname(file).toLowerCase();
    const contentType = SUPPORTED_EXTENSIONS[extension];
    if (!contentType) {
      throw new UnsupportedFormatError(file, extension ? `"${extension}" files are not accepted` : 'file has no extension');
    }

    const sizeBytes = await this.sizeOf(file);
    if (sizeBytes > this.limits.maxFileBytes) {
      throw new TooLargeError(file, sizeBytes, this.limits.maxFileBytes);
    }

    const image = await this.decode(file);
    return {
      photo: { path: file, extension, contentType, sizeBytes, width: image.bitmap.width, height: image.bitmap.height },
      image,
    };
  }

  async process(file: string, recordId: number): Promise<ProcessedPhoto> {
    const { photo: validated, image } = await this.inspect(file);
    const dir = recordPhotoDir(this.uploadsDir, recordId);
    const paths: PhotoPaths = {
      photoOriginalPath: join(dir, `original${validated.extension}`),
      photoPath: join(dir, 'photo.jpg'),
      thumbnailPath: join(dir, 'thumb.jpg'),
    };

    const optimized = fitWithin(image.clone(), this.limits.maxWidth, this.limits.maxHeight);
    const thumbnail = fitWithin(image.clone(), this.limits.thumbnailSize, this.limits.thumbnailSize);

    try {
      const [photoBytes, thumbBytes] = await Promise.all([
        optimized.getBuffer(JimpMime.jpeg, { quality: this.limits.quality }),
        thumbnail.getBuffer(JimpMime.jpeg, { quality: this.limits.thumbnailQuality }),
      ]);
      await mkdir(dir, { recursive: true });
      // A replacement with another extension must not leave the previous original behind
      for (const entry of await readdir(dir)) {
        if (entry.startsWith('original.') && entry !== basename(paths.photoOriginalPath)) {
          await rm(join(dir, entry), { force: true });
        }
      }
      // Reprocessing a stored original must not copy it onto itself
      if (resolve(file) !== resolve(paths.photoOriginalPath)) {
        await copyFile(file, paths.photoOriginalPath);
      }
      await writeFile(paths.photoPath, photoBytes);
      await writeFile(paths.thumbnailPath, thumbBytes);
    } catch (e) {
      console.warn('photoHandler.process failed', recordId, e);
      throw new StorageError(`Could not store photo for inspection ${recordId}: ${errorMessage(e)}`, { recordId, path: file }, e);
    }

    console.info('[photoHandler] stored photo', paths.photoPath);
    return {
      ...paths,
      width: optimized.bitmap.width,
      height: optimized.bitmap.height,
      thumbnailWidth: thumbnail.bitmap.width,
      thumbnailHeight: thumbnail.bitmap.height,
    };
  }

  async getPhotoInfo(file: string): Promise<PhotoInfo | null> {
    try {
      const stats = await stat(file);
      const image = await Jimp.read(await readFile(file));
      return {
        path: file,
        filename: basename(file),
        contentType: SUPPORTED_EXTENSIONS[extname(file).toLowerCase()] ?? null,
        sizeBytes: stats.size,
        sizeMb: stats.size / (1024 * 1024),
        width: image.bitmap.width,
        height: image.bitmap.height,
        createdAt: stats.birthtime.toISOString(),
        modifiedAt: stats.mtime.toISOString(),
      };
    } catch (e) {
      console.warn('photoHandler.getPhotoInfo failed', file, e);
      return null;
    }
  }

  /** Deletes the record's photo directory. Returns false when there was nothing to delete. */
  async removeRecordPhotos(recordId: number): Promise<boolean> {
    const dir = recordPhotoDir(this.uploadsDir, recordId);
    try {
      await stat(dir);
    } catch {
      return false;
    }
    try {
      await rm(dir, { recursive: true, force: true });
      return true;
    } catch (e) {
      throw new StorageError(`Could not remove photos for inspection ${recordId}: ${errorMessage(e)}`, { recordId, path: dir }, e);
    }
  }

  async listStoredPhotos(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.uploadsDir, { recursive: true });
    } catch (e) {
      if (isMissing(e)) return [];
      throw new StorageError(`Could not list ${this.uploadsDir}: ${errorMessage(e)}`, { path: this.uploadsDir }, e);
    }
    return entries
      .filter((entry) => SUPPORTED_EXTENSIONS[extname(entry).toLowerCase()] !== undefined)
      .map((entry) => join(this.uploadsDir, entry))
      .sort();
  }

  private async sizeOf(file: string): Promise<number> {
    try {
      return (await stat(file)).size;
    } catch (e) {
      throw new StorageError(`Could not read photo ${file}: ${errorMessage(e)}`, { path: file }, e);
    }
  }

  private async decode(file: string): Promise<JimpImage> {
    let bytes: Buffer;
    try {
      bytes = await readFile(file);
    } catch (e) {
      throw new StorageError(`Could not read photo ${file}: ${errorMessage(e)}`, { path: file }, e);
    }
    try {
      return await Jimp.read(bytes);
    } catch (e) {
      if (e instanceof InspectionError) throw e;
      throw new UnsupportedFormatError(file, 'content is not a readable image');
    }
  }
}

// Only ever shrinks; aspect ratio is preserved
function fitWithin(image: JimpImage, maxWidth: number, maxHeight: number): JimpImage {
  if (image.bitmap.width > maxWidth || image.bitmap.height > maxHeight) {
    image.scaleToFit({ w: maxWidth, h: maxHeight });
  }
  return image;
}

function isMissing(e: unknown) {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}
