import fs from 'node:fs/promises';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import { createReportWriteError, type ReportWriteError } from '../../core/errors.js';

import type { ReportArtifact, ReportSink } from '../../core/ports.js';

export interface FsReportSinkOptions {
  /** Directory the files are written into; created when missing */
  outputDir: string;
}

interface StagedFile {
  readonly tempPath: string;
  readonly targetPath: string;
}

const removeAll = async (paths: readonly string[]): Promise<void> => {
  await Promise.all(paths.map((filePath) => fs.rm(filePath, { force: true })));
};

/**
 * Removes staged and committed files after a failed write. A cleanup failure
 * is reported together with the write failure.
 */
const rollback = async (
  failedPath: string,
  error: unknown,
  paths: readonly string[]
): Promise<ReportWriteError> => {
  try {
    await removeAll(paths);
  } catch (cleanupError) {
    return createReportWriteError(
      failedPath,
      new AggregateError([error, cleanupError], 'Write failed and cleanup failed')
    );
  }
  return createReportWriteError(failedPath, error);
};

/**
 * Writes report files into a local directory, replacing existing ones.
 *
 * Every file is first written under a temporary name and then renamed into
 * place. When any step fails, the files of this call are removed, so a
 * failed write leaves no report files behind.
 */
export const createFsReportSink = (options: FsReportSinkOptions): ReportSink => ({
  location: options.outputDir,

  async write(artifacts: readonly ReportArtifact[]): Promise<Result<string[], ReportWriteError>> {
    try {
      await fs.mkdir(options.outputDir, { recursive: true });
    } catch (error) {
      return err(createReportWriteError(options.outputDir, error));
    }

    const staged: StagedFile[] = [];
    for (const artifact of artifacts) {
      const targetPath = path.join(options.outputDir, artifact.fileName);
      const tempPath = path.join(options.outputDir, `.${artifact.fileName}.${process.pid}.tmp`);
      staged.push({ tempPath, targetPath });
      try {
        await fs.writeFile(tempPath, artifact.contents, 'utf8');
      } catch (error) {
        return err(
          await rollback(
            targetPath,
            error,
            staged.map((file) => file.tempPath)
          )
        );
      }
    }

    const committed: string[] = [];
    for (const file of staged) {
      try {
        await fs.rename(file.tempPath, file.targetPath);
      } catch (error) {
        return err(
          await rollback(file.targetPath, error, [
            ...committed,
            ...staged.map((entry) => entry.tempPath),
          ])
        );
      }
      committed.push(file.targetPath);
    }

    return ok(committed);
  },
});
