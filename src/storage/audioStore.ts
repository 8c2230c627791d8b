import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { log } from '../log';
import type { AudioStoreOptions, StoredAudio } from './types';

const TEMP_SUFFIX = '.tmp';
const DEFAULT_STALE_TEMP_MS = 60 * 60 * 1000;

function isTempFileName(fileName: string): boolean {
  return fileName.startsWith('.') && fileName.endsWith(TEMP_SUFFIX);
}

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Flat directory of immutable audio files, addressed by file name.
 *
 * Files are published with write-to-temp-then-rename so a reader never sees
 * a partially written artifact at its final name. Temp files are dotfiles,
 * which the static handler does not serve.
 */
export class AudioStore {
  public readonly directory: string;
  private readonly staleTempMs: number;

  constructor(options: AudioStoreOptions) {
    this.directory = path.resolve(options.directory);
    this.staleTempMs = options.staleTempMs ?? DEFAULT_STALE_TEMP_MS;
  }

  public pathFor(fileName: string): string {
    if (fileName !== path.basename(fileName) || fileName.startsWith('.')) {
      throw new Error(`invalid audio file name: ${fileName}`);
    }
    return path.join(this.directory, fileName);
  }

  public async ensureDirectory(): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
  }

  public async exists(fileName: string): Promise<boolean> {
    try {
      const stats = await fs.stat(this.pathFor(fileName));
      return stats.isFile();
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  public async writeAtomic(fileName: string, data: Buffer): Promise<StoredAudio> {
    const localPath = this.pathFor(fileName);
    const tempPath = path.join(this.directory, `.${fileName}.${randomUUID()}${TEMP_SUFFIX}`);

    await this.ensureDirectory();
    try {
      await fs.writeFile(tempPath, data, { flag: 'wx' });
      await fs.rename(tempPath, localPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        log.warn({ err: cleanupError, tempPath }, 'audio temp file cleanup failed');
      });
      throw error;
    }

    return { fileName, localPath, bytes: data.length };
  }

  /**
   * Removes temp files abandoned by an interrupted write. Published audio is
   * never touched.
   */
  public async sweepTempFiles(now: number = Date.now()): Promise<number> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return 0;
      }
      throw error;
    }

    let deleted = 0;
    for (const entry of entries) {
      if (!isTempFileName(entry)) {
        continue;
      }

      const filePath = path.join(this.directory, entry);
      try {
        const stats = await fs.stat(filePath);
        if (now - stats.mtimeMs > this.staleTempMs) {
          await fs.unlink(filePath);
          deleted += 1;
        }
      } catch (error) {
        log.warn({ err: error, filePath }, 'audio temp sweep file error');
      }
    }

    if (deleted > 0) {
      log.info({ event: 'audio_temp_sweep', deleted }, 'audio temp sweep completed');
    }

    return deleted;
  }
}
