/**
 * Shared flow of the Self Service build steps.
 *
 * Every Self Service operation answers with an envelope naming an action
 * and, usually, a job. If the action is already complete there is nothing
 * to wait for; otherwise the job is published on the run and polled until
 * it settles.
 *
 * @module steps/self-service
 */

import { findEngine } from '../config.js';
import { waitForJob } from '../monitoring/waiters.js';
import { createServices, type EngineServices } from '../services/index.js';
import type { EngineResponse } from '../types/resources.js';
import { isActionCompleted } from '../types/status.js';
import {
  PublishEnvVarAction,
  clientsFor,
  reportStepError,
  type BuildStep,
  type StepContext,
} from './context.js';
import { getMessage } from './messages.js';

export abstract class SelfServiceStep implements BuildStep {
  abstract readonly displayName: string;

  protected constructor(
    /** Name of the configured engine */
    readonly engine: string
  ) {}

  /**
   * Start the operation. Runs after login; throws for an undefined operation.
   */
  protected abstract execute(services: EngineServices): Promise<EngineResponse>;

  /**
   * Reference to publish on the run next to the job.
   */
  protected abstract publishedReference(response: EngineResponse): string | null;

  /**
   * Hook for parameter checks that only warn; runs before the engine lookup.
   */
  protected checkParameters(_context: StepContext): void {}

  async perform(context: StepContext): Promise<void> {
    const { log, run } = context;
    this.checkParameters(context);

    const engine = findEngine(context.config, this.engine);
    if (!engine) {
      log.error(getMessage('INVALID_ENGINE_ENVIRONMENT', this.engine));
      return;
    }

    const client = clientsFor(context).engine(engine);
    const address = client.getEngineAddress();
    const services = createServices(client);

    let response: EngineResponse;
    try {
      await client.login();
      response = await this.execute(services);
    } catch (error) {
      reportStepError(log, error, address);
      return;
    }

    if (response.action) {
      try {
        const action = await services.jobs.getActionStatus(response.action);
        if (isActionCompleted(action.state)) {
          log.info(`${action.title}: ${action.state}`);
          return;
        }
      } catch (error) {
        reportStepError(log, error, address);
      }
    }

    const job = response.job;
    if (!job) {
      return;
    }

    const reference = this.publishedReference(response);
    if (reference) {
      run.addAction(new PublishEnvVarAction(reference, engine.name));
    }
    run.addAction(new PublishEnvVarAction(job, engine.name));

    await waitForJob(services.jobs, job, {
      intervalMs: context.config.jobPollInterval,
      signal: context.signal,
      logger: log,
      onError: (error) => reportStepError(log, error, address),
    });
  }
}
