/**
 * Deployment Pipeline
 *
 * Stages run strictly one after another. A fatal stage failure marks the
 * remaining stages skipped and the original error propagates unmodified; a
 * stage classified `warn` is logged and the run continues.
 */

import type { Logger } from 'pino';
import { extractErrorMessage } from '@/lib/errors';
import { createTimer } from '@/lib/logger';

export type StageFailureMode = 'fatal' | 'warn';

export type StageStatus = 'succeeded' | 'warned' | 'failed' | 'skipped';

export interface PipelineStage<C> {
  name: string;
  description: string;
  failure: StageFailureMode;
  /** Checked before `run`; a throw here counts as the stage failing */
  precondition?: (context: C) => Promise<void>;
  /** Return a message to report the stage as warned without failing */
  run: (context: C) => Promise<string | void>;
}

export interface StageReport {
  name: string;
  status: StageStatus;
  durationMs: number;
  error?: string;
  warning?: string;
}

export interface RunStagesOptions {
  logger: Logger;
  onStage?: (report: StageReport) => void;
}

export async function runStages<C>(
  stages: readonly PipelineStage<C>[],
  context: C,
  options: RunStagesOptions,
): Promise<StageReport[]> {
  const { logger, onStage } = options;
  const reports: StageReport[] = [];
  const record = (report: StageReport): void => {
    reports.push(report);
    onStage?.(report);
  };

  for (const [index, stage] of stages.entries()) {
    const log = logger.child({ stage: stage.name });
    const timer = createTimer(log, stage.name);
    log.info(stage.description);

    try {
      await stage.precondition?.(context);
      const warning = await stage.run(context);
      const durationMs = timer.end();
      record(
        warning
          ? { name: stage.name, status: 'warned', durationMs, warning }
          : { name: stage.name, status: 'succeeded', durationMs },
      );
    } catch (error) {
      if (stage.failure === 'warn') {
        const durationMs = timer.end({ warning: extractErrorMessage(error) });
        log.warn({ error: extractErrorMessage(error) }, `${stage.name} failed; continuing`);
        record({ name: stage.name, status: 'warned', durationMs, warning: extractErrorMessage(error) });
        continue;
      }

      const durationMs = timer.error(error);
      record({ name: stage.name, status: 'failed', durationMs, error: extractErrorMessage(error) });
      for (const skipped of stages.slice(index + 1)) {
        record({ name: skipped.name, status: 'skipped', durationMs: 0 });
      }
      logger.error({ stages: reports.map(({ name, status }) => `${name}:${status}`) }, 'Pipeline aborted');
      throw error;
    }
  }

  return reports;
}
