import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { ConfigService } from '@nestjs/config';
import { ErrorCode } from '@contactbook/common/errors';
import { AvatarStorageService, MAX_AVATAR_BYTES } from './avatar-storage.service';

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}

describe('AvatarStorageService', () => {
  let basePath: string;
  let storage: AvatarStorageService;

  beforeEach(async () => {
    basePath = await fs.mkdtemp(path.join(os.tmpdir(), 'avatars-spec-'));
    storage = new AvatarStorageService(
      new ConfigService({ storageBasePath: basePath, publicUrl: 'http://localhost:8000/' }),
    );
  });

  afterEach(async () => {
    await fs.rm(basePath, { recursive: true, force: true });
  });

  it('should write the image under a generated name and return its public URL', async () => {
    const stored = await storage.save(7, {
      buffer: Buffer.from('png-bytes'),
      mimetype: 'image/png',
      size: 9,
    });

    expect(stored.fileName).toMatch(/^7-[0-9a-f-]{36}\.png$/);
    expect(stored.url).toBe(`http://localhost:8000/users/avatars/${stored.fileName}`);
    await expect(
      fs.readFile(path.join(basePath, 'avatars', stored.fileName), 'utf8'),
    ).resolves.toBe('png-bytes');
  });

  it('should reject types other than jpeg, png, gif and webp', async () => {
    await expect(
      storage.save(7, { buffer: Buffer.from('text'), mimetype: 'text/plain', size: 4 }),
    ).rejects.toMatchObject({
      code: ErrorCode.InvalidFile,
      message: 'Avatar must be a JPEG, PNG, GIF or WebP image',
    });
  });

  it('should reject files over 5 MB', async () => {
    await expect(
      storage.save(7, { buffer: Buffer.from('x'), mimetype: 'image/jpeg', size: MAX_AVATAR_BYTES + 1 }),
    ).rejects.toMatchObject({ code: ErrorCode.InvalidFile, message: 'Avatar must not exceed 5 MB' });
  });

  it('should reject empty files', async () => {
    await expect(
      storage.save(7, { buffer: Buffer.alloc(0), mimetype: 'image/gif', size: 0 }),
    ).rejects.toMatchObject({ code: ErrorCode.InvalidFile, message: 'Avatar file is empty' });
  });

  it('should stream a stored avatar back with its type and size', async () => {
    const stored = await storage.save(3, {
      buffer: Buffer.from('webp-bytes'),
      mimetype: 'image/webp',
      size: 10,
    });

    const avatar = await storage.open(stored.fileName);

    expect(avatar.contentType).toBe('image/webp');
    expect(avatar.size).toBe(10);
    await expect(readAll(avatar.stream)).resolves.toBe('webp-bytes');
  });

  it('should refuse names that were not generated here', async () => {
    await expect(storage.open('../secret.png')).rejects.toMatchObject({
      code: ErrorCode.FileNotFound,
    });
    await expect(storage.open('notes.txt')).rejects.toMatchObject({
      code: ErrorCode.FileNotFound,
    });
  });

  it('should report a missing avatar as not found', async () => {
    await expect(
      storage.open('1-00000000-0000-4000-8000-000000000000.png'),
    ).rejects.toMatchObject({ code: ErrorCode.FileNotFound, httpStatusCode: 404 });
  });

  it('should delete its own avatars by URL and ignore foreign URLs', async () => {
    const stored = await storage.save(7, {
      buffer: Buffer.from('jpeg-bytes'),
      mimetype: 'image/jpeg',
      size: 10,
    });

    await storage.removeByUrl('https://cdn.example.com/avatar.png');
    await expect(fs.readdir(path.join(basePath, 'avatars'))).resolves.toEqual([stored.fileName]);

    await storage.removeByUrl(stored.url);
    await expect(fs.readdir(path.join(basePath, 'avatars'))).resolves.toEqual([]);
  });
});
