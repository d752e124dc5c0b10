import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileConnectionError, FileConnectionService } from './file-connection.service';

describe('FileConnectionService', () => {
  let dir: string;
  let service: FileConnectionService;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'file-connection-'));
    service = new FileConnectionService({ baseDelayMs: 0 });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('readFile', () => {
    it('should read file content', async () => {
      await writeFile(join(dir, 'data.jsonl'), 'content', 'utf-8');
      await expect(service.readFile(join(dir, 'data.jsonl'))).resolves.toBe('content');
    });

    it('should fail with FILE_NOT_FOUND without retrying', async () => {
      const error = await service.readFile(join(dir, 'missing.jsonl')).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(FileConnectionError);
      expect(error).toMatchObject({ code: 'FILE_NOT_FOUND' });
      expect(console.warn).not.toHaveBeenCalled();
    });

    it('should retry transient errors and then fail with READ_ERROR', async () => {
      // Reading a directory fails with EISDIR on every attempt
      const error = await service.readFile(dir).catch((e: unknown) => e);
      expect(error).toMatchObject({ code: 'READ_ERROR' });
      expect(console.warn).toHaveBeenCalledTimes(2);
    });
  });

  describe('writeFileAtomic', () => {
    it('should replace the file content and leave no temp files', async () => {
      const path = join(dir, 'data.jsonl');
      await writeFile(path, 'old', 'utf-8');

      await service.writeFileAtomic(path, 'new');

      expect(await readFile(path, 'utf-8')).toBe('new');
      expect(await readdir(dir)).toEqual(['data.jsonl']);
    });

    it('should create missing parent directories', async () => {
      const path = join(dir, 'nested', 'data.jsonl');
      await service.writeFileAtomic(path, 'content');
      expect(await readFile(path, 'utf-8')).toBe('content');
    });
  });

  describe('createBackup', () => {
    it('should copy the file to a timestamped backup', async () => {
      const path = join(dir, 'data.jsonl');
      await writeFile(path, 'line\n', 'utf-8');

      const backupPath = await service.createBackup(path, join(dir, 'backups'));

      expect(backupPath).toMatch(/backups[\\/]backup_\d{8}_\d{6}\.jsonl$/);
      expect(await readFile(backupPath ?? '', 'utf-8')).toBe('line\n');
    });

    it('should skip missing or empty files', async () => {
      const path = join(dir, 'data.jsonl');
      await expect(service.createBackup(path, join(dir, 'backups'))).resolves.toBeNull();

      await writeFile(path, '', 'utf-8');
      await expect(service.createBackup(path, join(dir, 'backups'))).resolves.toBeNull();
    });
  });
});
