/**
 * What a build step is handed when it runs.
 * @module steps/context
 */

import type { Dispatcher } from 'undici';
import type { CredentialStore, SecretString } from '../auth/index.js';
import { type EngineClient, createEngineClient } from '../client/index.js';
import type { EngineDefinition, PluginConfiguration } from '../config.js';
import { DctClient } from '../dct/client.js';
import { ConsoleLogger, type Logger } from '../observability/logging.js';
import { isDelphixError } from '../types/errors.js';
import { getMessage } from './messages.js';

/**
 * Records a remote reference a step created or touched, so a later step
 * (or a post-build cleanup) can find it.
 */
export class PublishEnvVarAction {
  constructor(
    /** Bookmark, job or VDB reference */
    readonly reference: string,
    /** Engine name, or the DCT URL for DCT resources */
    readonly engine: string
  ) {}
}

/**
 * The build a step runs in.
 */
export class BuildRun {
  private readonly actions: PublishEnvVarAction[] = [];

  constructor(
    readonly id: string,
    /** Directory output files are written to */
    readonly workspace: string
  ) {}

  addAction(action: PublishEnvVarAction): void {
    this.actions.push(action);
  }

  getActions(): readonly PublishEnvVarAction[] {
    return [...this.actions];
  }

  /**
   * References published for one engine, oldest first.
   */
  getPublishedReferences(engine: string): string[] {
    return this.actions.filter((a) => a.engine === engine).map((a) => a.reference);
  }
}

/**
 * Builds the HTTP clients steps talk through.
 */
export interface ClientFactory {
  engine(definition: EngineDefinition): EngineClient;
  dct(baseUrl: string, apiKey: SecretString): DctClient;
}

/**
 * Default client factory.
 *
 * @param options.dispatcher - undici dispatcher shared by every client
 * @param options.logger - Debug logger for the clients (not the build log)
 */
export function createClientFactory(
  config: PluginConfiguration,
  options: { dispatcher?: Dispatcher; logger?: Logger } = {}
): ClientFactory {
  return {
    engine: (definition) => createEngineClient(definition, config, options),
    dct: (baseUrl, apiKey) =>
      new DctClient({
        baseUrl,
        apiKey,
        timeout: config.timeout,
        userAgent: config.userAgent,
        dispatcher: options.dispatcher,
        logger: options.logger,
      }),
  };
}

export interface StepContext {
  run: BuildRun;
  /** The build log */
  log: Logger;
  config: PluginConfiguration;
  credentials: CredentialStore;
  /** Defaults to {@link createClientFactory} over `config` */
  clients?: ClientFactory;
  /** Fires when the build is aborted; polling stops and the step returns */
  signal?: AbortSignal;
}

/**
 * Assembles a step context for a run. The build log defaults to the console
 * and the clients share `options.dispatcher`.
 */
export function createStepContext(
  run: BuildRun,
  config: PluginConfiguration,
  credentials: CredentialStore,
  options: { log?: Logger; signal?: AbortSignal; dispatcher?: Dispatcher } = {}
): StepContext {
  return {
    run,
    log: options.log ?? new ConsoleLogger(),
    config,
    credentials,
    clients: createClientFactory(config, { dispatcher: options.dispatcher }),
    signal: options.signal,
  };
}

/**
 * A build step. `perform` reports failures on the build log and resolves;
 * it does not reject.
 */
export interface BuildStep {
  readonly displayName: string;
  perform(context: StepContext): Promise<void>;
}

export function clientsFor(context: StepContext): ClientFactory {
  return context.clients ?? createClientFactory(context.config);
}

/**
 * Writes a step failure to the build log: a connectivity failure as
 * "Unable to connect", anything else as its own message.
 */
export function reportStepError(log: Logger, error: unknown, address: string): void {
  if (isDelphixError(error) && error.isConnectivityError()) {
    log.error(getMessage('UNABLE_TO_CONNECT', address));
    return;
  }
  log.error(error instanceof Error ? error.message : String(error));
}

/**
 * Resolves the DCT URL and API key and opens a client, logging why when
 * either is missing.
 */
export async function openDctClient(
  context: StepContext,
  credentialId: string
): Promise<DctClient | null> {
  const url = context.config.dctUrl;
  if (!url) {
    context.log.error(getMessage('DCT_CONFIGURATION_MISSING'));
    return null;
  }

  const apiKey = await context.credentials.getApiKey(credentialId);
  if (!apiKey) {
    context.log.error(getMessage('CREDENTIALS_NOT_FOUND', credentialId));
    return null;
  }

  return clientsFor(context).dct(url, apiKey);
}
