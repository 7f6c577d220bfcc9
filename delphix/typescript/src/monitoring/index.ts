/**
 * Monitoring module exports
 */

export { StatusPoller, waitFor } from './poller.js';
export type {
  StatusPollerConfig,
  StatusFetcher,
  StatusCallback,
  PollHandlers,
} from './poller.js';

export { waitForJob, waitForAction, waitForDctJob } from './waiters.js';
export type { WaitOptions } from './waiters.js';
