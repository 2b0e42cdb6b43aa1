import type { ReportWriteError } from './errors.js';
import type { Result } from 'neverthrow';

/**
 * One serialized output file.
 */
export interface ReportArtifact {
  readonly fileName: string;
  readonly contents: string;
}

/**
 * Where serialized reports go.
 */
export interface ReportSink {
  /** Human-readable location, used in logs */
  readonly location: string;

  /**
   * Writes every artifact in order.
   *
   * @returns Paths written
   */
  write(artifacts: readonly ReportArtifact[]): Promise<Result<string[], ReportWriteError>>;
}
