/**
 * Engine services module.
 */

import type { EngineClient } from '../client/index.js';
import { BookmarkService } from './bookmarks.js';
import { ContainerService } from './containers.js';
import { JobService } from './jobs.js';

export { BookmarkService, BOOKMARK_PATH } from './bookmarks.js';
export type { BookmarkCreateParameters } from './bookmarks.js';
export { ContainerService, CONTAINER_PATH } from './containers.js';
export { JobService, JOB_PATH, ACTION_PATH } from './jobs.js';

/**
 * Container for all engine services.
 */
export interface EngineServices {
  bookmarks: BookmarkService;
  containers: ContainerService;
  jobs: JobService;
}

/**
 * Creates all engine services with a shared client, so one login covers them.
 */
export function createServices(client: EngineClient): EngineServices {
  return {
    bookmarks: new BookmarkService(client),
    containers: new ContainerService(client),
    jobs: new JobService(client),
  };
}
