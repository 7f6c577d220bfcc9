/**
 * Self Service Container Service
 * Reads data containers and starts refresh/reset/restore operations on them.
 */

import type { EngineClient } from '../client/index.js';
import { API_ROOT } from '../client/index.js';
import type { EngineResponse, SelfServiceContainer } from '../types/resources.js';
import { parseSelfServiceContainer } from '../types/resources.js';
import { DelphixError } from '../types/errors.js';

export const CONTAINER_PATH = `${API_ROOT}/jetstream/container`;

/**
 * Container repository for a single engine.
 */
export class ContainerService {
  constructor(private readonly client: EngineClient) {}

  /**
   * Lists containers as returned by the engine.
   */
  async list(): Promise<unknown[]> {
    const response = await this.client.get(CONTAINER_PATH);
    if (!Array.isArray(response.result)) {
      throw DelphixError.deserialization('Container list result is not an array');
    }
    return response.result;
  }

  /**
   * Lists containers keyed by reference, in the order the engine returned them.
   */
  async listContainers(): Promise<Map<string, SelfServiceContainer>> {
    const containers = new Map<string, SelfServiceContainer>();
    for (const json of await this.list()) {
      const container = parseSelfServiceContainer(json);
      containers.set(container.reference, container);
    }
    return containers;
  }

  /**
   * Gets a container by reference.
   */
  async get(containerRef: string): Promise<SelfServiceContainer> {
    const response = await this.client.get(`${CONTAINER_PATH}/${encodeURIComponent(containerRef)}`);
    return parseSelfServiceContainer(response.result);
  }

  /**
   * Refreshes the container's data from its template sources.
   */
  async refresh(containerRef: string): Promise<EngineResponse> {
    return this.client.post(`${CONTAINER_PATH}/${encodeURIComponent(containerRef)}/refresh`, {
      type: 'JSDataContainerRefreshParameters',
      forceOption: false,
    });
  }

  /**
   * Resets the container to the latest point of its active branch.
   */
  async reset(containerRef: string): Promise<EngineResponse> {
    return this.client.post(`${CONTAINER_PATH}/${encodeURIComponent(containerRef)}/reset`, {
      type: 'JSDataContainerResetParameters',
      forceOption: false,
    });
  }

  /**
   * Restores the container to a bookmark.
   */
  async restore(containerRef: string, bookmarkRef: string): Promise<EngineResponse> {
    return this.client.post(`${CONTAINER_PATH}/${encodeURIComponent(containerRef)}/restore`, {
      type: 'JSDataContainerRestoreParameters',
      timelinePointParameters: {
        type: 'JSTimelinePointBookmarkInput',
        bookmark: bookmarkRef,
      },
      forceOption: false,
    });
  }
}
