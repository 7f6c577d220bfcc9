/**
 * Build step managing a Self Service bookmark.
 * @module steps/bookmark
 */

import type { EngineServices } from '../services/index.js';
import { DelphixError } from '../types/errors.js';
import type { EngineResponse } from '../types/resources.js';
import type { StepContext } from './context.js';
import { getMessage } from './messages.js';
import { SelfServiceStep } from './self-service.js';

/**
 * Operations offered for the bookmark step, in display order.
 */
export const BOOKMARK_OPERATIONS = ['Create', 'Update', 'Delete', 'Share'] as const;

export type BookmarkOperation = (typeof BOOKMARK_OPERATIONS)[number];

/** Bookmark value of an unset selection. */
export const NO_SELECTION = 'NULL';

/** Name given to bookmarks the step creates. */
export const DEFAULT_BOOKMARK_NAME = 'Created By Pipeline';

export interface SelfServiceBookmarkStepParameters {
  /** Configured engine name */
  engine: string;
  /** Bookmark reference (Delete, Share) */
  bookmark: string;
  /**
   * Operation name as entered in the pipeline. Kept as a plain string:
   * anything outside the defined set fails with a defined error.
   */
  operation: string;
  /** Container reference (Create) */
  container: string;
  /** Name for a created bookmark */
  bookmarkName?: string;
}

export class SelfServiceBookmarkStep extends SelfServiceStep {
  readonly displayName = 'Delphix - Self Service Bookmark';

  readonly bookmark: string;
  readonly operation: string;
  readonly container: string;
  readonly bookmarkName: string;

  constructor(params: SelfServiceBookmarkStepParameters) {
    super(params.engine);
    this.bookmark = params.bookmark;
    this.operation = params.operation;
    this.container = params.container;
    this.bookmarkName = params.bookmarkName ?? DEFAULT_BOOKMARK_NAME;
  }

  protected checkParameters(context: StepContext): void {
    if (this.bookmark === NO_SELECTION) {
      context.log.error(getMessage('INVALID_ENGINE_ENVIRONMENT', this.engine));
    }
  }

  protected async execute(services: EngineServices): Promise<EngineResponse> {
    switch (this.operation) {
      case 'Create': {
        const container = await services.containers.get(this.container);
        return services.bookmarks.create(
          this.bookmarkName,
          container.activeBranch,
          container.reference
        );
      }
      case 'Delete':
        return services.bookmarks.delete(this.bookmark);
      case 'Share':
        return services.bookmarks.share(this.bookmark);
      default:
        throw DelphixError.undefinedOperation(getMessage('UNDEFINED_BOOKMARK_OPERATION'));
    }
  }

  protected publishedReference(response: EngineResponse): string | null {
    if (this.operation === 'Create') {
      return typeof response.result === 'string' ? response.result : null;
    }
    return this.bookmark;
  }
}
