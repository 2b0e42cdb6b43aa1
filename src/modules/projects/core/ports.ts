import type { Result } from 'neverthrow';

import type { FileNotFoundError, FileReadError } from './errors.js';

/**
 * Where the raw dataset text comes from.
 */
export interface ProjectSource {
  /** Human-readable location, used in logs */
  readonly location: string;

  /**
   * Reads the whole dataset as text.
   */
  readText(): Promise<Result<string, FileNotFoundError | FileReadError>>;
}
