/**
 * DCT API module.
 */

export { DctClient, apiKeyHeader } from './client.js';
export type { DctClientConfig } from './client.js';

export { VdbService, DctJobService, createDctServices } from './services.js';
export type { DctServices } from './services.js';

export {
  dctJobSchema,
  provisionVdbResponseSchema,
  deleteVdbResponseSchema,
} from './types.js';
export type {
  DctJob,
  ProvisionVdbResponse,
  DeleteVdbResponse,
  ProvisionVdbCommonParameters,
  ProvisionVdbFromBookmarkParameters,
  ProvisionVdbBySnapshotParameters,
} from './types.js';
