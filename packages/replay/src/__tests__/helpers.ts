import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

/**
 * Scratch directory under the OS temp dir, removed by `cleanup`
 */
export interface Scratch {
  dir: string;
  write(relativePath: string, contents: string): Promise<string>;
  mkdir(relativePath: string): Promise<string>;
  cleanup(): Promise<void>;
}

export async function createScratch(): Promise<Scratch> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'price-median-'));

  return {
    dir,
    async write(relativePath, contents) {
      const target = path.join(dir, relativePath);
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, contents, 'utf8');
      return target;
    },
    async mkdir(relativePath) {
      const target = path.join(dir, relativePath);
      await mkdir(target, { recursive: true });
      return target;
    },
    async cleanup() {
      await rm(dir, { recursive: true, force: true });
    },
  };
}
