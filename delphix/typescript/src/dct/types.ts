/**
 * DCT request and response types.
 *
 * Field names follow the DCT wire format (snake_case).
 *
 * @module dct/types
 */

import { z } from 'zod';
import { DCT_JOB_STATUSES } from '../types/status.js';

export const dctJobSchema = z.object({
  id: z.string(),
  status: z.enum(DCT_JOB_STATUSES),
  type: z.string().nullable().optional(),
  localized_type: z.string().nullable().optional(),
  error_details: z.string().nullable().optional(),
  warning_message: z.string().nullable().optional(),
  target_id: z.string().nullable().optional(),
  target_name: z.string().nullable().optional(),
  start_time: z.string().nullable().optional(),
  update_time: z.string().nullable().optional(),
  percent_complete: z.number().nullable().optional(),
});

/**
 * A DCT job.
 */
export type DctJob = z.infer<typeof dctJobSchema>;

export const provisionVdbResponseSchema = z.object({
  vdb_id: z.string(),
  job: dctJobSchema,
});

/**
 * Response to a VDB provision request.
 */
export type ProvisionVdbResponse = z.infer<typeof provisionVdbResponseSchema>;

export const deleteVdbResponseSchema = z.object({
  job: dctJobSchema,
});

/**
 * Response to a VDB delete request.
 */
export type DeleteVdbResponse = z.infer<typeof deleteVdbResponseSchema>;

/**
 * Options shared by every provision request.
 */
export interface ProvisionVdbCommonParameters {
  /** Name of the new VDB. */
  name?: string;
  /** Database name on the target environment. */
  database_name?: string;
  /** Target environment. */
  environment_id?: string;
  /** Environment user the VDB runs as. */
  environment_user_id?: string;
  /** Repository (installation) to provision into. */
  repository_id?: string;
  /** Let DCT pick a compatible repository on the target environment. */
  auto_select_repository?: boolean;
  /** Group the VDB is placed in. */
  target_group_id?: string;
  /** Mount point for the VDB files. */
  mount_point?: string;
  /** Tags attached to the new VDB. */
  tags?: Array<{ key: string; value: string }>;
}

/**
 * Parameters for provisioning a VDB from a bookmark.
 */
export interface ProvisionVdbFromBookmarkParameters extends ProvisionVdbCommonParameters {
  bookmark_id: string;
}

/**
 * Parameters for provisioning a VDB from a snapshot of a dSource or VDB.
 *
 * Without `snapshot_id` the latest snapshot of `source_data_id` is used.
 */
export interface ProvisionVdbBySnapshotParameters extends ProvisionVdbCommonParameters {
  source_data_id?: string;
  snapshot_id?: string;
  engine_id?: string;
}
