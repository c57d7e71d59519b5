/**
 * Avatar Storage Service
 * Local disk storage for profile pictures
 * Storage path: <storageBasePath>/avatars/<accountId>-<uuid>.<ext>
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as path from 'path';
import { createReadStream } from 'fs';
import { Readable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import { ERRORS } from '@contactbook/common/errors';

export const MAX_AVATAR_BYTES = 5 * 1024 * 1024; // 5 MB

const EXTENSIONS_BY_TYPE: Record<string, string> = {
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/gif': '.gif',
  'image/webp': '.webp',
};

const TYPES_BY_EXTENSION: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

const AVATAR_FILE_NAME = /^\d+-[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\.(jpg|png|gif|webp)$/;

export interface AvatarUpload {
  buffer: Buffer;
  mimetype: string;
  size: number;
}

export interface StoredAvatar {
  fileName: string;
  url: string;
}

export interface AvatarFile {
  stream: Readable;
  size: number;
  contentType: string;
}

@Injectable()
export class AvatarStorageService {
  private readonly logger = new Logger(AvatarStorageService.name);
  private readonly avatarsDir: string;
  private readonly publicUrl: string;

  constructor(private configService: ConfigService) {
    const basePath = this.configService.get<string>('storageBasePath') || './data';
    this.avatarsDir = path.resolve(basePath, 'avatars');
    this.publicUrl = (this.configService.get<string>('publicUrl') || 'http://localhost:8000').replace(/\/+$/, '');
  }

  /**
   * Write an uploaded image and return its public URL
   */
  async save(accountId: number, upload: AvatarUpload): Promise<StoredAvatar> {
    const ext = EXTENSIONS_BY_TYPE[upload.mimetype];
    if (!ext) {
      throw ERRORS.InvalidFile('Avatar must be a JPEG, PNG, GIF or WebP image');
    }
    if (upload.size === 0 || upload.buffer.length === 0) {
      throw ERRORS.InvalidFile('Avatar file is empty');
    }
    if (upload.size > MAX_AVATAR_BYTES || upload.buffer.length > MAX_AVATAR_BYTES) {
      throw ERRORS.InvalidFile('Avatar must not exceed 5 MB');
    }

    const fileName = `${accountId}-${uuidv4()}${ext}`;

    await fs.mkdir(this.avatarsDir, { recursive: true });
    await fs.writeFile(this.fullPath(fileName), upload.buffer);

    this.logger.log(`Avatar written: ${fileName} (${upload.buffer.length} bytes)`);

    return { fileName, url: this.urlFor(fileName) };
  }

  /**
   * Open a stored avatar for streaming
   */
  async open(fileName: string): Promise<AvatarFile> {
    const fullPath = this.fullPath(fileName);

    let size: number;
    try {
      const stats = await fs.stat(fullPath);
      size = stats.size;
    } catch (error) {
      if (isMissingFile(error)) {
        throw ERRORS.FileNotFound(fileName, error instanceof Error ? error : undefined);
      }
      throw error;
    }

    return {
      stream: createReadStream(fullPath),
      size,
      contentType: TYPES_BY_EXTENSION[path.extname(fileName)] ?? 'application/octet-stream',
    };
  }

  /**
   * Delete the avatar behind `url` if it is one of ours; other URLs are ignored
   */
  async removeByUrl(url: string): Promise<void> {
    const fileName = this.fileNameFromUrl(url);
    if (!fileName) {
      return;
    }

    try {
      await fs.unlink(this.fullPath(fileName));
      this.logger.log(`Avatar deleted: ${fileName}`);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }
  }

  urlFor(fileName: string): string {
    return `${this.publicUrl}/users/avatars/${fileName}`;
  }

  private fileNameFromUrl(url: string): string | null {
    const prefix = `${this.publicUrl}/users/avatars/`;
    if (!url.startsWith(prefix)) {
      return null;
    }
    const fileName = url.slice(prefix.length);
    return AVATAR_FILE_NAME.test(fileName) ? fileName : null;
  }

  /**
   * Only generated names are accepted, so no path separators or `..` can reach the join
   */
  private fullPath(fileName: string): string {
    if (!AVATAR_FILE_NAME.test(fileName)) {
      throw ERRORS.FileNotFound(fileName);
    }

    const resolved = path.resolve(this.avatarsDir, fileName);
    if (path.dirname(resolved) !== this.avatarsDir) {
      throw ERRORS.FileNotFound(fileName);
    }

    return resolved;
  }
}

// fs rejections are not always `instanceof Error` across realms (e.g. under Jest)
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
