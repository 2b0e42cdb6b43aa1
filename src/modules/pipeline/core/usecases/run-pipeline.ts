/**
 * Run Pipeline Use Case
 *
 * Loader → Cleaner → reports and summary → serialization → sink.
 * Every artifact is built before the first write; a fatal error returns
 * before the sink is called.
 */

import { err, ok, type Result } from 'neverthrow';

import { cleanRecords, loadRecords, type ProjectSource } from '../../../projects/index.js';
import {
  REPORT_FILES,
  buildReports,
  collectNotices,
  formatJson,
  toReportArtifacts,
  type ReportArtifact,
  type ReportSink,
} from '../../../reports/index.js';

import type { PipelineError, PipelineOutcome, RunLog } from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RunPipelineDeps {
  source: ProjectSource;
  sink: ReportSink;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Produces every report for one dataset.
 */
export const runPipeline = async (
  deps: RunPipelineDeps
): Promise<Result<PipelineOutcome, PipelineError>> => {
  const { source, sink } = deps;
  const log = deps.logger.child({ component: 'Pipeline' });

  log.info({ source: source.location }, 'Reading dataset');
  const textResult = await source.readText();
  if (textResult.isErr()) {
    log.error({ error: textResult.error }, textResult.error.message);
    return err(textResult.error);
  }

  const loadResult = loadRecords(textResult.value);
  if (loadResult.isErr()) {
    log.error({ error: loadResult.error }, loadResult.error.message);
    return err(loadResult.error);
  }
  const loaded = loadResult.value;

  for (const issue of loaded.rejected) {
    log.warn({ rowNumber: issue.rowNumber, reason: issue.reason }, issue.message);
  }
  log.info(
    { totalRows: loaded.totalRows, rejectedRows: loaded.rejected.length },
    'Dataset loaded'
  );

  const cleaned = cleanRecords(loaded.rows);
  for (const issue of cleaned.dropped) {
    log.warn({ rowNumber: issue.rowNumber, reason: issue.reason }, issue.message);
  }
  for (const warning of cleaned.warnings) {
    log.warn({ rowNumber: warning.rowNumber, type: warning.type }, warning.message);
  }
  log.info(
    {
      cleanRecords: cleaned.records.length,
      droppedRows: cleaned.dropped.length,
      filteredByYear: cleaned.filteredByYear,
      imputed: cleaned.imputed,
    },
    'Records cleaned'
  );

  const reports = buildReports(cleaned.records);
  const notices = collectNotices(reports);
  for (const notice of notices) {
    log.info({ report: notice.report, type: notice.type, key: notice.key }, notice.message);
  }

  const reportArtifacts = toReportArtifacts(reports);
  const runLog: RunLog = {
    source: source.location,
    counts: {
      totalRows: loaded.totalRows,
      rejectedRows: loaded.rejected.length,
      droppedRows: cleaned.dropped.length,
      filteredByYear: cleaned.filteredByYear,
      cleanRecords: cleaned.records.length,
      imputedLatitude: cleaned.imputed.latitude,
      imputedLongitude: cleaned.imputed.longitude,
    },
    rejected: loaded.rejected,
    dropped: cleaned.dropped,
    warnings: cleaned.warnings,
    notices,
    files: [...reportArtifacts.map((artifact) => artifact.fileName), REPORT_FILES.runLog],
  };

  const artifacts: ReportArtifact[] = [
    ...reportArtifacts,
    { fileName: REPORT_FILES.runLog, contents: formatJson(runLog) },
  ];

  const writeResult = await sink.write(artifacts);
  if (writeResult.isErr()) {
    log.error({ error: writeResult.error }, writeResult.error.message);
    return err(writeResult.error);
  }

  log.info({ outputDir: sink.location, files: writeResult.value.length }, 'Reports written');

  return ok({ reports, runLog, written: writeResult.value });
};
