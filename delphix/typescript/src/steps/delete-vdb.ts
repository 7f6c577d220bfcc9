/**
 * Build step deleting a VDB through DCT.
 * @module steps/delete-vdb
 */

import { createDctServices } from '../dct/services.js';
import type { DeleteVdbResponse } from '../dct/types.js';
import { PublishEnvVarAction, openDctClient, reportStepError, type BuildStep, type StepContext } from './context.js';
import { pollDctJob } from './dct-job.js';
import { getMessage } from './messages.js';

export interface DeleteVdbStepParameters {
  credentialId: string;
  vdbId: string;
  /** Delete even if the target environment cannot be cleaned up */
  force?: boolean;
  skipPolling?: boolean;
}

export class DeleteVdbStep implements BuildStep {
  readonly displayName = 'Delphix - Delete VDB';

  constructor(readonly params: DeleteVdbStepParameters) {}

  async perform(context: StepContext): Promise<void> {
    const { log, run } = context;
    const client = await openDctClient(context, this.params.credentialId);
    if (!client) {
      return;
    }
    const address = client.getBaseUrl();
    const services = createDctServices(client);

    let response: DeleteVdbResponse;
    try {
      response = await services.vdbs.deleteVdb(this.params.vdbId, this.params.force ?? false);
    } catch (error) {
      reportStepError(log, error, address);
      return;
    }

    log.info(getMessage('JOB_SUBMITTED', response.job.id));
    run.addAction(new PublishEnvVarAction(response.job.id, address));

    if (!this.params.skipPolling) {
      await pollDctJob(context, services.jobs, response.job.id, address);
    }
  }
}
