import { randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';
import type { MediaKind } from '@/types/submission';
import { LocalStorageError, classifyError } from './errors';
import { createLogger } from './logger';

const logger = createLogger('media-store');

const SAFE_ID = /^[A-Za-z0-9_-]+$/;
const TEMP_SUFFIX = '.tmp';

const FILE_NAMES: Record<MediaKind, (id: string) => string> = {
  video: id => `${id}.mp4`,
  thumbnail: id => `${id}_thumb.jpg`,
};

function isErrnoCode(error: unknown, code: string): boolean {
  return (
    error instanceof Error && 'code' in error && error.code === code
  );
}

/**
 * Write-once on-device storage for captured media, keyed by submission id.
 *
 * A file is only visible at its final path once fully written and synced:
 * bytes go to a temp file which is then hard-linked into place. Linking
 * fails if the target exists, so committed files are never replaced.
 */
export class LocalMediaStore {
  constructor(private readonly rootDir: string) {}

  get directory(): string {
    return this.rootDir;
  }

  pathFor(id: string, kind: MediaKind = 'video'): string {
    if (!SAFE_ID.test(id)) {
      throw new LocalStorageError({
        message: 'Submission id is not usable as a file name',
        details: { submissionId: id },
      });
    }
    return path.join(this.rootDir, FILE_NAMES[kind](id));
  }

  async save(
    bytes: Uint8Array,
    id: string,
    kind: MediaKind = 'video'
  ): Promise<string> {
    const finalPath = this.pathFor(id, kind);
    const tempPath = `${finalPath}.${randomUUID()}${TEMP_SUFFIX}`;

    try {
      await fs.promises.mkdir(this.rootDir, { recursive: true });

      const handle = await fs.promises.open(tempPath, 'wx');
      try {
        await handle.writeFile(bytes);
        await handle.sync();
      } finally {
        await handle.close();
      }

      await fs.promises.link(tempPath, finalPath);
    } catch (error) {
      if (isErrnoCode(error, 'EEXIST')) {
        throw new LocalStorageError({
          message: 'Media file already exists; files are write-once',
          cause: error,
          details: { submissionId: id, kind, path: finalPath },
        });
      }

      const classified = classifyError(error);
      throw new LocalStorageError({
        message: `Failed to save ${kind}: ${classified.message}`,
        cause: error,
        details: { submissionId: id, kind, path: finalPath },
      });
    } finally {
      await this.unlinkQuietly(tempPath);
    }

    logger.debug('Media saved', {
      submissionId: id,
      kind,
      path: finalPath,
      size: bytes.byteLength,
    });

    return finalPath;
  }

  async exists(id: string, kind: MediaKind = 'video'): Promise<boolean> {
    try {
      const stat = await fs.promises.stat(this.pathFor(id, kind));
      return stat.isFile();
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return false;
      throw error;
    }
  }

  /**
   * Remove all media for an id. Missing files are not an error.
   */
  async remove(id: string): Promise<void> {
    for (const kind of ['video', 'thumbnail'] as const) {
      const filePath = this.pathFor(id, kind);
      try {
        await fs.promises.unlink(filePath);
        logger.debug('Media removed', { submissionId: id, kind });
      } catch (error) {
        if (isErrnoCode(error, 'ENOENT')) continue;
        throw new LocalStorageError({
          message: `Failed to remove ${kind}`,
          cause: error,
          details: { submissionId: id, kind, path: filePath },
        });
      }
    }
  }

  /**
   * Scoped read access: the handle is closed on every exit path of `fn`.
   */
  async withFile<T>(
    id: string,
    kind: MediaKind,
    fn: (handle: fs.promises.FileHandle, size: number) => Promise<T>
  ): Promise<T> {
    const filePath = this.pathFor(id, kind);

    let handle: fs.promises.FileHandle;
    try {
      handle = await fs.promises.open(filePath, 'r');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        throw new LocalStorageError({
          message: `Backing ${kind} file is missing`,
          cause: error,
          details: { submissionId: id, kind, path: filePath },
        });
      }
      throw new LocalStorageError({
        message: `Failed to open ${kind}`,
        cause: error,
        details: { submissionId: id, kind, path: filePath },
      });
    }

    try {
      const stat = await handle.stat();
      return await fn(handle, stat.size);
    } finally {
      await handle.close();
    }
  }

  async readBytes(id: string, kind: MediaKind = 'video'): Promise<Buffer> {
    return this.withFile(id, kind, handle => handle.readFile());
  }

  /**
   * Remove temp files left by writes interrupted by a crash
   */
  async sweepTempFiles(): Promise<number> {
    let entries: string[];
    try {
      entries = await fs.promises.readdir(this.rootDir);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return 0;
      throw error;
    }

    let deletedCount = 0;
    for (const entry of entries) {
      if (!entry.endsWith(TEMP_SUFFIX)) continue;
      await this.unlinkQuietly(path.join(this.rootDir, entry));
      deletedCount++;
    }

    if (deletedCount > 0) {
      logger.info('Cleaned temp files from interrupted writes', {
        deletedCount,
        mediaDir: this.rootDir,
      });
    }

    return deletedCount;
  }

  private async unlinkQuietly(filePath: string): Promise<void> {
    try {
      await fs.promises.unlink(filePath);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return;
      logger.warn('Failed to delete temp file', {
        filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
