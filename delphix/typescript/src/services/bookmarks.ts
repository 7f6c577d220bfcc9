/**
 * Self Service Bookmark Service
 * One method per bookmark endpoint of the engine's jetstream API.
 */

import type { EngineClient } from '../client/index.js';
import { API_ROOT } from '../client/index.js';
import type { EngineResponse, SelfServiceBookmark } from '../types/resources.js';
import { parseSelfServiceBookmark } from '../types/resources.js';
import { DelphixError } from '../types/errors.js';

export const BOOKMARK_PATH = `${API_ROOT}/jetstream/bookmark`;

/**
 * Request body for creating a bookmark at the latest point of a branch.
 */
export interface BookmarkCreateParameters {
  type: 'JSBookmarkCreateParameters';
  bookmark: {
    type: 'JSBookmark';
    name: string;
    branch: string;
  };
  timelinePointParameters: {
    type: 'JSTimelinePointLatestTimeInput';
    sourceDataLayout: string;
  };
}

/**
 * Bookmark repository for a single engine.
 */
export class BookmarkService {
  constructor(private readonly client: EngineClient) {}

  /**
   * Lists bookmarks as returned by the engine.
   *
   * @returns The envelope's `result` array
   */
  async list(): Promise<unknown[]> {
    const response = await this.client.get(BOOKMARK_PATH);
    if (!Array.isArray(response.result)) {
      throw DelphixError.deserialization('Bookmark list result is not an array');
    }
    return response.result;
  }

  /**
   * Lists bookmarks keyed by reference, in the order the engine returned them.
   */
  async listBookmarks(): Promise<Map<string, SelfServiceBookmark>> {
    const bookmarks = new Map<string, SelfServiceBookmark>();
    for (const json of await this.list()) {
      const bookmark = parseSelfServiceBookmark(json);
      bookmarks.set(bookmark.reference, bookmark);
    }
    return bookmarks;
  }

  /**
   * Creates a bookmark at the latest point in time of a branch.
   *
   * @param name - Bookmark name
   * @param branch - Branch reference (e.g. "JS_BRANCH-4")
   * @param sourceDataLayout - Container or template reference the branch belongs to
   * @returns Envelope carrying the new bookmark reference, action and job
   */
  async create(name: string, branch: string, sourceDataLayout: string): Promise<EngineResponse> {
    const request: BookmarkCreateParameters = {
      type: 'JSBookmarkCreateParameters',
      bookmark: { type: 'JSBookmark', name, branch },
      timelinePointParameters: {
        type: 'JSTimelinePointLatestTimeInput',
        sourceDataLayout,
      },
    };
    return this.client.post(BOOKMARK_PATH, request);
  }

  /**
   * Deletes a bookmark by reference.
   */
  async delete(bookmarkRef: string): Promise<EngineResponse> {
    return this.client.post(`${BOOKMARK_PATH}/${encodeURIComponent(bookmarkRef)}/delete`, {});
  }

  /**
   * Shares a bookmark with every user of the template.
   */
  async share(bookmarkRef: string): Promise<EngineResponse> {
    return this.client.post(`${BOOKMARK_PATH}/${encodeURIComponent(bookmarkRef)}/share`, {});
  }
}
