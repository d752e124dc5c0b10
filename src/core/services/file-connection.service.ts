import { copyFile, mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import { errorCode, errorMessage } from '../../shared/utils/error.utils';
import { formatFileTimestamp } from '../../shared/utils/time-format.utils';

export type FileConnectionErrorCode = 'READ_ERROR' | 'WRITE_ERROR' | 'PERMISSION_DENIED' | 'FILE_NOT_FOUND';

export class FileConnectionError extends Error {
  constructor(
    message: string,
    public readonly userMessage: string,
    public readonly code: FileConnectionErrorCode
  ) {
    super(message);
    this.name = 'FileConnectionError';
  }
}

export interface FileConnectionOptions {
  maxRetries?: number;
  baseDelayMs?: number;
}

// File operation retry configuration
const FILE_READ_WRITE_MAX_RETRIES = 3;
const FILE_READ_WRITE_BASE_DELAY_MS = 50;

const PERMISSION_CODES = new Set(['EACCES', 'EPERM', 'EROFS']);

/**
 * File access for the interchange-file store: reads and writes with retries,
 * replace-on-write through a temp file, and timestamped backups.
 */
export class FileConnectionService {
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;

  constructor(options: FileConnectionOptions = {}) {
    this.maxRetries = Math.max(1, options.maxRetries ?? FILE_READ_WRITE_MAX_RETRIES);
    this.baseDelayMs = options.baseDelayMs ?? FILE_READ_WRITE_BASE_DELAY_MS;
  }

  /**
   * Read file content with consistent error handling and retry mechanism.
   * Retries with exponential backoff for transient errors.
   */
  async readFile(path: string): Promise<string> {
    for (let attempt = 0; ; attempt++) {
      try {
        const content = await readFile(path, 'utf-8');
        if (attempt > 0) {
          console.log(`[FileConnection] Read succeeded after ${attempt} retries`);
        }
        return content;
      } catch (error) {
        const code = errorCode(error);
        // Non-retriable errors
        if (code !== undefined && PERMISSION_CODES.has(code)) {
          throw new FileConnectionError(
            `Permission denied reading ${path}`,
            'No permission to read the data file.',
            'PERMISSION_DENIED'
          );
        }
        if (code === 'ENOENT') {
          throw new FileConnectionError(`File not found: ${path}`, 'Data file not found.', 'FILE_NOT_FOUND');
        }

        if (attempt === this.maxRetries - 1) {
          throw new FileConnectionError(
            'Failed to read file: ' + errorMessage(error),
            'Error reading the data file: ' + errorMessage(error),
            'READ_ERROR'
          );
        }
        await this.backoff('Read', attempt, error);
      }
    }
  }

  /**
   * Replace a file's content: the content goes to a temp file beside the
   * target which is then renamed over it, so readers never see a partial file.
   */
  async writeFileAtomic(path: string, content: string): Promise<void> {
    await this.ensureDirectory(dirname(path));
    const tempPath = join(dirname(path), `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);

    for (let attempt = 0; ; attempt++) {
      try {
        await writeFile(tempPath, content, 'utf-8');
        await rename(tempPath, path);
        if (attempt > 0) {
          console.log(`[FileConnection] Write succeeded after ${attempt} retries`);
        }
        return;
      } catch (error) {
        await rm(tempPath, { force: true });
        const code = errorCode(error);
        if (code !== undefined && PERMISSION_CODES.has(code)) {
          throw new FileConnectionError(
            `Permission denied writing ${path}`,
            'No permission to write the data file.',
            'PERMISSION_DENIED'
          );
        }

        if (attempt === this.maxRetries - 1) {
          throw new FileConnectionError(
            'Failed to write file: ' + errorMessage(error),
            'Error writing the data file: ' + errorMessage(error),
            'WRITE_ERROR'
          );
        }
        await this.backoff('Write', attempt, error);
      }
    }
  }

  /**
   * Copies the current file to `<backupDir>/backup_<YYYYMMDD_HHMMSS><ext>`.
   * Returns the backup path, or null when there is nothing to back up.
   * A failed backup is logged and never blocks the write it precedes.
   */
  async createBackup(path: string, backupDir: string): Promise<string | null> {
    try {
      const current = await stat(path);
      if (current.size === 0) {
        return null;
      }
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      console.warn('[Backup] Failed to inspect data file:', errorMessage(error));
      return null;
    }

    const backupPath = join(backupDir, `backup_${formatFileTimestamp(new Date())}${extname(path)}`);
    try {
      await this.ensureDirectory(backupDir);
      await copyFile(path, backupPath);
      console.log(`[Backup] Created backup: ${backupPath}`);
      return backupPath;
    } catch (error) {
      console.warn('[Backup] Failed to create backup:', errorMessage(error));
      return null;
    }
  }

  async ensureDirectory(dir: string): Promise<void> {
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      const code = errorCode(error);
      if (code !== undefined && PERMISSION_CODES.has(code)) {
        throw new FileConnectionError(
          `Permission denied creating ${dir}`,
          'No permission to create the directory.',
          'PERMISSION_DENIED'
        );
      }
      throw new FileConnectionError(
        `Failed to create directory ${dir}: ${errorMessage(error)}`,
        'Error creating the directory: ' + errorMessage(error),
        'WRITE_ERROR'
      );
    }
  }

  private async backoff(operation: 'Read' | 'Write', attempt: number, error: unknown): Promise<void> {
    const delayMs = this.baseDelayMs * Math.pow(2, attempt);
    console.warn(
      `[FileConnection] ${operation} failed (attempt ${attempt + 1}/${this.maxRetries}), retrying in ${delayMs}ms:`,
      errorMessage(error)
    );
    await new Promise(resolve => setTimeout(resolve, delayMs));
  }
}
