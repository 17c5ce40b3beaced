import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { FileSystemError, toError } from '../../domain/errors.js';
import type { Store } from '../../domain/repositories/Store.js';
import { Logger, getLogger } from '../logging.js';

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Store backed by a directory on the local file system
 */
export class FileStore implements Store {
  private readonly rootDir: string;
  private readonly logger: Logger;

  constructor(rootDir: string, loggerInstance?: Logger) {
    this.rootDir = path.resolve(rootDir);
    this.logger = loggerInstance || getLogger();
  }

  getRootDir(): string {
    return this.rootDir;
  }

  async read(relativePath: string): Promise<string> {
    const filePath = this.resolve(relativePath);
    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (error: unknown) {
      throw new FileSystemError('Failed to read file', filePath, toError(error));
    }
  }

  /**
   * Writes to a temporary file first and renames it into place
   */
  async write(relativePath: string, content: string): Promise<void> {
    const filePath = this.resolve(relativePath);
    const tempFilePath = `${filePath}.${randomUUID()}.tmp`;

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(tempFilePath, content, 'utf-8');
      await fs.rename(tempFilePath, filePath);
      this.logger.debug(`Wrote ${Buffer.byteLength(content)} bytes to ${filePath}`, 'FileStore.write');
    } catch (error: unknown) {
      await fs.rm(tempFilePath, { force: true });
      throw new FileSystemError('Failed to write file', filePath, toError(error));
    }
  }

  async exists(relativePath: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(relativePath));
      return true;
    } catch {
      return false;
    }
  }

  async size(relativePath: string): Promise<number> {
    const filePath = this.resolve(relativePath);
    try {
      const stats = await fs.stat(filePath);
      return stats.size;
    } catch (error: unknown) {
      throw new FileSystemError('Failed to stat file', filePath, toError(error));
    }
  }

  async list(relativePath = ''): Promise<string[]> {
    const dirPath = this.resolve(relativePath);
    try {
      const names = await fs.readdir(dirPath);
      return names.sort();
    } catch (error: unknown) {
      if (hasErrorCode(error, 'ENOENT')) {
        return [];
      }
      throw new FileSystemError('Failed to list directory', dirPath, toError(error));
    }
  }

  async delete(relativePath: string): Promise<void> {
    const target = this.resolve(relativePath);
    try {
      await fs.rm(target, { recursive: true, force: true });
    } catch (error: unknown) {
      throw new FileSystemError('Failed to delete', target, toError(error));
    }
  }

  /**
   * Absolute path inside the root; paths escaping it are refused
   */
  private resolve(relativePath: string): string {
    const resolved = path.resolve(this.rootDir, relativePath);
    if (resolved !== this.rootDir && !resolved.startsWith(this.rootDir + path.sep)) {
      this.logger.error(`Path traversal refused: ${relativePath}`, 'FileStore.resolve');
      throw new FileSystemError('Path escapes the store root', relativePath);
    }
    return resolved;
  }
}
