/**
 * Engine Job Service
 * Fetches job and action records, the two things a build step watches after
 * starting an operation.
 */

import type { EngineClient } from '../client/index.js';
import { API_ROOT } from '../client/index.js';
import type { ActionStatus, JobStatus } from '../types/resources.js';
import { parseActionStatus, parseJobStatus } from '../types/resources.js';

export const JOB_PATH = `${API_ROOT}/job`;
export const ACTION_PATH = `${API_ROOT}/action`;

export class JobService {
  constructor(private readonly client: EngineClient) {}

  /**
   * Gets the current status of a job.
   *
   * @param jobRef - Job reference (e.g. "JOB-12")
   */
  async getJobStatus(jobRef: string): Promise<JobStatus> {
    const response = await this.client.get(`${JOB_PATH}/${encodeURIComponent(jobRef)}`);
    return parseJobStatus(response.result);
  }

  /**
   * Gets the current status of an action.
   *
   * @param actionRef - Action reference (e.g. "ACTION-7")
   */
  async getActionStatus(actionRef: string): Promise<ActionStatus> {
    const response = await this.client.get(`${ACTION_PATH}/${encodeURIComponent(actionRef)}`);
    return parseActionStatus(response.result);
  }
}
