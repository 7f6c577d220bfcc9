/**
 * DCT services: VDB provisioning/deletion and job lookup.
 * @module dct/services
 */

import { parseWith } from '../types/resources.js';
import type { DctClient } from './client.js';
import {
  dctJobSchema,
  deleteVdbResponseSchema,
  provisionVdbResponseSchema,
  type DctJob,
  type DeleteVdbResponse,
  type ProvisionVdbBySnapshotParameters,
  type ProvisionVdbFromBookmarkParameters,
  type ProvisionVdbResponse,
} from './types.js';

/**
 * VDB repository.
 */
export class VdbService {
  constructor(private readonly client: DctClient) {}

  /**
   * Provisions a VDB from a bookmark.
   */
  async provisionFromBookmark(
    params: ProvisionVdbFromBookmarkParameters
  ): Promise<ProvisionVdbResponse> {
    const body = await this.client.post('/vdbs/provision_from_bookmark', params);
    return parseWith(provisionVdbResponseSchema, body, 'provision response');
  }

  /**
   * Provisions a VDB from a snapshot.
   */
  async provisionBySnapshot(
    params: ProvisionVdbBySnapshotParameters
  ): Promise<ProvisionVdbResponse> {
    const body = await this.client.post('/vdbs/provision_by_snapshot', params);
    return parseWith(provisionVdbResponseSchema, body, 'provision response');
  }

  /**
   * Deletes a VDB.
   *
   * @param vdbId - VDB id
   * @param force - Delete even if the engine cannot clean up the target environment
   */
  async deleteVdb(vdbId: string, force = false): Promise<DeleteVdbResponse> {
    const body = await this.client.post(`/vdbs/${encodeURIComponent(vdbId)}/delete`, { force });
    return parseWith(deleteVdbResponseSchema, body, 'delete response');
  }
}

/**
 * DCT job repository.
 */
export class DctJobService {
  constructor(private readonly client: DctClient) {}

  async getJob(jobId: string): Promise<DctJob> {
    const body = await this.client.get(`/jobs/${encodeURIComponent(jobId)}`);
    return parseWith(dctJobSchema, body, 'job');
  }
}

export interface DctServices {
  vdbs: VdbService;
  jobs: DctJobService;
}

export function createDctServices(client: DctClient): DctServices {
  return {
    vdbs: new VdbService(client),
    jobs: new DctJobService(client),
  };
}
