/**
 * Build step provisioning a VDB through DCT.
 * @module steps/provision-vdb
 */

import { writeFile } from 'fs/promises';
import path from 'path';
import type { VdbService } from '../dct/services.js';
import { createDctServices } from '../dct/services.js';
import type { ProvisionVdbCommonParameters, ProvisionVdbResponse } from '../dct/types.js';
import { DelphixError, DelphixErrorKind } from '../types/errors.js';
import { PublishEnvVarAction, openDctClient, reportStepError, type BuildStep, type StepContext } from './context.js';
import { pollDctJob } from './dct-job.js';
import { getMessage } from './messages.js';

export const PROVISION_TYPES = ['bookmark', 'snapshot'] as const;

export type ProvisionType = (typeof PROVISION_TYPES)[number];

export interface ProvisionVdbStepParameters {
  /** DCT API key credential id */
  credentialId: string;
  /** "bookmark" or "snapshot" */
  provisionType: string;
  /** Bookmark to provision from (bookmark) */
  bookmarkId?: string;
  /** dSource or VDB to provision from (snapshot) */
  sourceDataId?: string;
  /** Snapshot to provision from (snapshot); latest of `sourceDataId` when unset */
  snapshotId?: string;
  engineId?: string;
  name?: string;
  databaseName?: string;
  environmentId?: string;
  environmentUserId?: string;
  repositoryId?: string;
  autoSelectRepository?: boolean;
  targetGroupId?: string;
  mountPoint?: string;
  tags?: Record<string, string>;
  /** Return once the job is submitted */
  skipPolling?: boolean;
  /** Workspace-relative file the provision response is written to as JSON */
  outputFile?: string;
}

export class ProvisionVdbStep implements BuildStep {
  readonly displayName = 'Delphix - Provision VDB';

  constructor(readonly params: ProvisionVdbStepParameters) {}

  async perform(context: StepContext): Promise<void> {
    const { log, run } = context;
    const client = await openDctClient(context, this.params.credentialId);
    if (!client) {
      return;
    }
    const address = client.getBaseUrl();
    const services = createDctServices(client);

    let response: ProvisionVdbResponse;
    try {
      response = await this.submit(services.vdbs);
    } catch (error) {
      reportStepError(log, error, address);
      return;
    }

    log.info(getMessage('JOB_SUBMITTED', response.job.id));
    run.addAction(new PublishEnvVarAction(response.vdb_id, address));
    run.addAction(new PublishEnvVarAction(response.job.id, address));

    if (this.params.outputFile) {
      const target = path.join(run.workspace, this.params.outputFile);
      try {
        await writeFile(target, JSON.stringify(response, null, 2), 'utf8');
      } catch (error) {
        reportStepError(log, error, address);
      }
    }

    if (!this.params.skipPolling) {
      await pollDctJob(context, services.jobs, response.job.id, address);
    }
  }

  private submit(vdbs: VdbService): Promise<ProvisionVdbResponse> {
    const p = this.params;
    const common: ProvisionVdbCommonParameters = {
      name: p.name,
      database_name: p.databaseName,
      environment_id: p.environmentId,
      environment_user_id: p.environmentUserId,
      repository_id: p.repositoryId,
      auto_select_repository: p.autoSelectRepository,
      target_group_id: p.targetGroupId,
      mount_point: p.mountPoint,
      tags: p.tags
        ? Object.entries(p.tags).map(([key, value]) => ({ key, value }))
        : undefined,
    };

    switch (p.provisionType) {
      case 'bookmark':
        if (!p.bookmarkId) {
          throw new DelphixError(
            DelphixErrorKind.ValidationError,
            'Provisioning from a bookmark requires a bookmark id'
          );
        }
        return vdbs.provisionFromBookmark({ ...common, bookmark_id: p.bookmarkId });
      case 'snapshot':
        if (!p.sourceDataId && !p.snapshotId) {
          throw new DelphixError(
            DelphixErrorKind.ValidationError,
            'Provisioning by snapshot requires a source data id or a snapshot id'
          );
        }
        return vdbs.provisionBySnapshot({
          ...common,
          source_data_id: p.sourceDataId,
          snapshot_id: p.snapshotId,
          engine_id: p.engineId,
        });
      default:
        throw DelphixError.undefinedOperation(getMessage('UNDEFINED_PROVISION_TYPE'));
    }
  }
}
