// Bundle storage: a directory on disk, or a map of paths for tests

import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { BundleStorage } from './types.js';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

async function statIfPresent(path: string) {
  try {
    return await stat(path);
  } catch (error) {
    if (isMissing(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Bundles as directories on the local disk
 */
export function createDirectoryBundleStorage(): BundleStorage {
  return {
    async writeFile(path, content) {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content, 'utf-8');
    },

    async mkdir(path) {
      await mkdir(path, { recursive: true });
    },

    async exists(path) {
      return (await statIfPresent(path)) !== null;
    },

    async isDirectory(path) {
      return (await statIfPresent(path))?.isDirectory() ?? false;
    },

    readFile(path) {
      return readFile(path, 'utf-8');
    },
  };
}

function parentsOf(path: string): string[] {
  const segments = path.split('/');
  const parents: string[] = [];
  for (let i = 1; i < segments.length; i++) {
    parents.push(segments.slice(0, i).join('/'));
  }
  return parents.filter((p) => p !== '');
}

export type MemoryBundleStorage = {
  storage: BundleStorage;
  files: Map<string, string>;
};

/**
 * Bundles held in a map keyed by '/'-separated path. Directories are implied
 * by the files under them and by mkdir.
 */
export function createMemoryBundleStorage(files: Map<string, string> = new Map()): MemoryBundleStorage {
  const directories = new Set<string>();
  for (const path of files.keys()) {
    parentsOf(path).forEach((dir) => directories.add(dir));
  }

  const storage: BundleStorage = {
    async writeFile(path, content) {
      files.set(path, content);
      parentsOf(path).forEach((dir) => directories.add(dir));
    },

    async mkdir(path) {
      directories.add(path);
      parentsOf(path).forEach((dir) => directories.add(dir));
    },

    async exists(path) {
      return files.has(path) || directories.has(path);
    },

    async isDirectory(path) {
      return directories.has(path);
    },

    async readFile(path) {
      const content = files.get(path);
      if (content === undefined) {
        throw new Error(`No bundle file at ${path}`);
      }
      return content;
    },
  };

  return { storage, files };
}
