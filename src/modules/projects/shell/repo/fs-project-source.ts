import fs from 'node:fs/promises';

import { err, ok, type Result } from 'neverthrow';

import {
  createFileNotFoundError,
  createFileReadError,
  type FileNotFoundError,
  type FileReadError,
} from '../../core/errors.js';

import type { ProjectSource } from '../../core/ports.js';

export interface FsProjectSourceOptions {
  /** Path to the CSV file */
  filePath: string;
}

/**
 * Reads the dataset from the local filesystem.
 */
export const createFsProjectSource = (options: FsProjectSourceOptions): ProjectSource => ({
  location: options.filePath,

  async readText(): Promise<Result<string, FileNotFoundError | FileReadError>> {
    try {
      return ok(await fs.readFile(options.filePath, 'utf8'));
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code === 'ENOENT') {
        return err(createFileNotFoundError(options.filePath));
      }
      return err(createFileReadError(options.filePath, error));
    }
  },
});
