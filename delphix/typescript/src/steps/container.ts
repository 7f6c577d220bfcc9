/**
 * Build step running a refresh, reset or restore on a Self Service container.
 * @module steps/container
 */

import type { EngineServices } from '../services/index.js';
import { DelphixError, DelphixErrorKind } from '../types/errors.js';
import type { EngineResponse } from '../types/resources.js';
import { getMessage } from './messages.js';
import { SelfServiceStep } from './self-service.js';

export const CONTAINER_OPERATIONS = ['Refresh', 'Reset', 'Restore'] as const;

export type ContainerOperation = (typeof CONTAINER_OPERATIONS)[number];

export interface SelfServiceContainerStepParameters {
  engine: string;
  container: string;
  operation: string;
  /** Bookmark reference to restore to (Restore only) */
  bookmark?: string;
}

export class SelfServiceContainerStep extends SelfServiceStep {
  readonly displayName = 'Delphix - Self Service Container';

  readonly container: string;
  readonly operation: string;
  readonly bookmark?: string;

  constructor(params: SelfServiceContainerStepParameters) {
    super(params.engine);
    this.container = params.container;
    this.operation = params.operation;
    this.bookmark = params.bookmark;
  }

  protected async execute(services: EngineServices): Promise<EngineResponse> {
    switch (this.operation) {
      case 'Refresh':
        return services.containers.refresh(this.container);
      case 'Reset':
        return services.containers.reset(this.container);
      case 'Restore':
        if (!this.bookmark) {
          throw new DelphixError(
            DelphixErrorKind.ValidationError,
            'Restore requires a bookmark'
          );
        }
        return services.containers.restore(this.container, this.bookmark);
      default:
        throw DelphixError.undefinedOperation(getMessage('UNDEFINED_CONTAINER_OPERATION'));
    }
  }

  protected publishedReference(): string {
    return this.container;
  }
}
