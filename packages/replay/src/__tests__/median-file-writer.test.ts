import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { MedianFileWriter, ensureOutputDir } from '../sinks/median-file-writer.js';
import { OutputDirError, OutputFileError } from '../errors.js';
import { createScratch, type Scratch } from './helpers.js';

describe('Median File Writer', () => {
  let scratch: Scratch;

  beforeEach(async () => {
    scratch = await createScratch();
  });

  afterEach(async () => {
    await scratch.cleanup();
  });

  describe('ensureOutputDir()', () => {
    it('should create nested directories', async () => {
      const dir = path.join(scratch.dir, 'a', 'b', 'c');
      await ensureOutputDir(dir);
      expect((await stat(dir)).isDirectory()).toBe(true);
    });

    it('should accept an existing directory', async () => {
      await expect(ensureOutputDir(scratch.dir)).resolves.toBeUndefined();
    });

    it('should fail when a file is in the way', async () => {
      const file = await scratch.write('blocker', 'x');
      await expect(ensureOutputDir(path.join(file, 'out'))).rejects.toBeInstanceOf(OutputDirError);
    });
  });

  describe('MedianFileWriter', () => {
    it('should write the header and one line per record', async () => {
      const target = path.join(scratch.dir, 'median_result.csv');
      const writer = await MedianFileWriter.open(target);

      writer.write({ timestamp: 10n, formattedMedian: '1.00000000' });
      writer.write({ timestamp: 20n, formattedMedian: '1.50000000' });
      await writer.close();

      expect(writer.rowCount).toBe(2);
      expect(await readFile(target, 'utf8')).toBe(
        'receive_ts;price_median\n10;1.00000000\n20;1.50000000\n'
      );
    });

    it('should write only the header when nothing changes', async () => {
      const target = path.join(scratch.dir, 'empty.csv');
      const writer = await MedianFileWriter.open(target);
      await writer.close();

      expect(await readFile(target, 'utf8')).toBe('receive_ts;price_median\n');
    });

    it('should truncate an existing file', async () => {
      const target = await scratch.write('median_result.csv', 'stale contents that are long\n');
      const writer = await MedianFileWriter.open(target);
      writer.write({ timestamp: 1n, formattedMedian: '5.00000000' });
      await writer.close();

      expect(await readFile(target, 'utf8')).toBe('receive_ts;price_median\n1;5.00000000\n');
    });

    it('should fail when the file cannot be opened', async () => {
      const target = path.join(scratch.dir, 'missing-dir', 'median_result.csv');
      await expect(MedianFileWriter.open(target)).rejects.toBeInstanceOf(OutputFileError);
    });
  });
});
