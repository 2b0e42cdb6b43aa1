/**
 * Fake implementations for testing
 * In-memory stand-ins for the file-backed ports
 */

import { err, ok } from 'neverthrow';
import pino from 'pino';

import type {
  FileNotFoundError,
  FileReadError,
  ProjectSource,
} from '@/modules/projects/index.js';
import type { ReportArtifact, ReportSink, ReportWriteError } from '@/modules/reports/index.js';
import type { Logger } from 'pino';

/**
 * Logger that drops everything
 */
export const testLogger: Logger = pino({ level: 'silent' });

interface FakeProjectSourceOptions {
  text?: string;
  error?: FileNotFoundError | FileReadError;
  location?: string;
}

/**
 * Project source serving fixed text or a fixed error
 */
export const makeFakeProjectSource = (options: FakeProjectSourceOptions = {}): ProjectSource => ({
  location: options.location ?? 'memory://projects.csv',
  async readText() {
    if (options.error !== undefined) {
      return err(options.error);
    }
    return ok(options.text ?? '');
  },
});

export interface FakeReportSink extends ReportSink {
  /** Artifacts of every successful write call, in order */
  readonly writes: ReportArtifact[][];
  /** Contents by file name from the latest write */
  readonly files: Map<string, string>;
}

interface FakeReportSinkOptions {
  failWith?: ReportWriteError;
}

/**
 * Report sink keeping files in memory
 */
export const makeFakeReportSink = (options: FakeReportSinkOptions = {}): FakeReportSink => {
  const writes: ReportArtifact[][] = [];
  const files = new Map<string, string>();

  return {
    location: 'memory://reports',
    writes,
    files,
    async write(artifacts) {
      if (options.failWith !== undefined) {
        return err(options.failWith);
      }
      writes.push([...artifacts]);
      for (const artifact of artifacts) {
        files.set(artifact.fileName, artifact.contents);
      }
      return ok(artifacts.map((artifact) => `memory://reports/${artifact.fileName}`));
    },
  };
};
