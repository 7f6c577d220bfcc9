/**
 * Polling tail shared by the DCT steps.
 * @module steps/dct-job
 */

import type { DctJobService } from '../dct/services.js';
import { waitForDctJob } from '../monitoring/waiters.js';
import { isDctJobRunning } from '../types/status.js';
import { reportStepError, type StepContext } from './context.js';
import { getMessage } from './messages.js';

/**
 * Polls a DCT job to completion and logs how it ended. A failed status
 * fetch ends the wait and is reported on the build log. An interrupted wait
 * logs no outcome.
 */
export async function pollDctJob(
  context: StepContext,
  jobs: DctJobService,
  jobId: string,
  address: string
): Promise<void> {
  const { log } = context;
  try {
    const job = await waitForDctJob(jobs, jobId, {
      intervalMs: context.config.dctPollInterval,
      signal: context.signal,
      logger: log,
    });
    // Interrupted: nothing finished yet
    if (!job || isDctJobRunning(job.status)) {
      return;
    }
    log.info(getMessage('JOB_FINISHED', job.id, job.status));
    if (job.error_details) {
      log.error(job.error_details);
    }
  } catch (error) {
    reportStepError(log, error, address);
  }
}
