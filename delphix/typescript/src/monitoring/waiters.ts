/**
 * Job and action waiters built on {@link StatusPoller}.
 * @module monitoring/waiters
 */

import { DEFAULT_DCT_POLL_INTERVAL, DEFAULT_JOB_POLL_INTERVAL } from '../config.js';
import type { DctJob } from '../dct/types.js';
import type { DctJobService } from '../dct/services.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';
import type { JobService } from '../services/jobs.js';
import type { ActionStatus, JobStatus } from '../types/resources.js';
import { initialJobStatus } from '../types/resources.js';
import { isActionRunning, isDctJobRunning, isJobRunning } from '../types/status.js';
import { StatusPoller } from './poller.js';

export interface WaitOptions {
  intervalMs?: number;
  signal?: AbortSignal;
  /** Receives progress lines (the build log) */
  logger?: Logger;
  /**
   * Handles a failed status fetch. Legacy waiters default to logging the
   * error message and carrying on.
   */
  onError?: (error: unknown) => void;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Waits for a legacy engine job, logging its summary whenever it changes.
 *
 * A failed fetch is reported and polling continues with the last status.
 */
export async function waitForJob(
  jobs: JobService,
  jobRef: string,
  options: WaitOptions = {}
): Promise<JobStatus | null> {
  const logger = options.logger ?? new NoopLogger();
  let lastSummary = initialJobStatus(jobRef).summary;

  const poller = new StatusPoller<JobStatus>({
    intervalMs: options.intervalMs ?? DEFAULT_JOB_POLL_INTERVAL,
    isRunning: (status) => isJobRunning(status.status),
    signal: options.signal,
    logger,
  });

  return poller.poll(() => jobs.getJobStatus(jobRef), {
    onUpdate: (status) => {
      if (status.summary !== lastSummary) {
        logger.info(status.summary);
        lastSummary = status.summary;
      }
    },
    onError: options.onError ?? ((error) => logger.error(describe(error))),
  });
}

/**
 * Waits for a legacy engine action to leave EXECUTING/WAITING.
 */
export async function waitForAction(
  jobs: JobService,
  actionRef: string,
  options: WaitOptions = {}
): Promise<ActionStatus | null> {
  const logger = options.logger ?? new NoopLogger();

  const poller = new StatusPoller<ActionStatus>({
    intervalMs: options.intervalMs ?? DEFAULT_JOB_POLL_INTERVAL,
    isRunning: (status) => isActionRunning(status.state),
    signal: options.signal,
    logger,
  });

  return poller.poll(() => jobs.getActionStatus(actionRef), {
    onError: options.onError ?? ((error) => logger.error(describe(error))),
  });
}

/**
 * Waits for a DCT job to leave STARTED, logging every status it sees.
 *
 * A failed fetch propagates unless `onError` is given.
 */
export async function waitForDctJob(
  jobs: DctJobService,
  jobId: string,
  options: WaitOptions = {}
): Promise<DctJob | null> {
  const logger = options.logger ?? new NoopLogger();

  const poller = new StatusPoller<DctJob>({
    intervalMs: options.intervalMs ?? DEFAULT_DCT_POLL_INTERVAL,
    isRunning: (job) => isDctJobRunning(job.status),
    signal: options.signal,
    logger,
  });

  return poller.poll(() => jobs.getJob(jobId), {
    onUpdate: (job) => logger.info(`Current Job Status: ${job.status}`),
    onError: options.onError,
  });
}
