/**
 * Build steps module exports
 */

export { Messages, getMessage } from './messages.js';
export type { MessageKey } from './messages.js';

export {
  PublishEnvVarAction,
  BuildRun,
  createClientFactory,
  createStepContext,
  clientsFor,
  reportStepError,
  openDctClient,
} from './context.js';
export type { ClientFactory, StepContext, BuildStep } from './context.js';

export { SelfServiceStep } from './self-service.js';

export {
  SelfServiceBookmarkStep,
  BOOKMARK_OPERATIONS,
  DEFAULT_BOOKMARK_NAME,
  NO_SELECTION,
} from './bookmark.js';
export type { BookmarkOperation, SelfServiceBookmarkStepParameters } from './bookmark.js';

export { SelfServiceContainerStep, CONTAINER_OPERATIONS } from './container.js';
export type { ContainerOperation, SelfServiceContainerStepParameters } from './container.js';

export { ProvisionVdbStep, PROVISION_TYPES } from './provision-vdb.js';
export type { ProvisionType, ProvisionVdbStepParameters } from './provision-vdb.js';

export { DeleteVdbStep } from './delete-vdb.js';
export type { DeleteVdbStepParameters } from './delete-vdb.js';

export { pollDctJob } from './dct-job.js';
