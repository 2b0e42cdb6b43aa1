/**
 * Pipeline Module - Public API
 *
 * One end-to-end run: read, load, clean, report, write.
 */

export type {
  PipelineError,
  PipelineOutcome,
  RunCounts,
  RunLog,
} from './core/types.js';

export { runPipeline, type RunPipelineDeps } from './core/usecases/run-pipeline.js';
