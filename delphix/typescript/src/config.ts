/**
 * Plugin configuration: the engines a pipeline may target, the DCT
 * endpoint, and client/poller tuning.
 * @module config
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { SecretString } from './auth/index.js';
import { DelphixError } from './types/errors.js';

/** Default request timeout in milliseconds (30 seconds). */
export const DEFAULT_TIMEOUT = 30000;

/** Interval between legacy job/action status fetches (1 second). */
export const DEFAULT_JOB_POLL_INTERVAL = 1000;

/** Interval between DCT job status fetches (20 seconds). */
export const DEFAULT_DCT_POLL_INTERVAL = 20000;

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = 'delphix-pipeline-steps/0.1.0';

/**
 * Legacy API version announced when opening a session.
 */
export interface ApiVersion {
  major: number;
  minor: number;
  micro: number;
}

export const DEFAULT_API_VERSION: ApiVersion = { major: 1, minor: 10, micro: 0 };

/**
 * A configured engine, selectable by name from a build step.
 */
export interface EngineDefinition {
  /** Display name build steps refer to. */
  name: string;
  /** Host name or base URL. A bare host gets `http://`. */
  address: string;
  username: string;
  password: SecretString;
}

/**
 * Plugin-wide configuration.
 */
export interface PluginConfiguration {
  engines: EngineDefinition[];
  /** DCT API base URL (e.g. "https://dct.example.com/v3"). */
  dctUrl?: string;
  /** Request timeout in milliseconds. */
  timeout: number;
  /** Legacy job/action poll interval in milliseconds. */
  jobPollInterval: number;
  /** DCT job poll interval in milliseconds. */
  dctPollInterval: number;
  apiVersion: ApiVersion;
  userAgent: string;
}

const engineSchema = z.object({
  name: z.string().min(1),
  address: z.string().min(1),
  username: z.string().min(1),
  password: z.instanceof(SecretString),
});

const configSchema = z
  .object({
    engines: z.array(engineSchema),
    dctUrl: z.string().url().optional(),
    timeout: z.number().int().positive(),
    jobPollInterval: z.number().int().nonnegative(),
    dctPollInterval: z.number().int().nonnegative(),
    apiVersion: z.object({
      major: z.number().int().nonnegative(),
      minor: z.number().int().nonnegative(),
      micro: z.number().int().nonnegative(),
    }),
    userAgent: z.string().min(1),
  })
  .refine(
    (config) => new Set(config.engines.map((e) => e.name)).size === config.engines.length,
    { message: 'Engine names must be unique', path: ['engines'] }
  );

/**
 * Shape of a JSON configuration file. Durations are in seconds.
 */
const fileSchema = z.object({
  engines: z
    .array(
      z.object({
        name: z.string(),
        address: z.string(),
        username: z.string(),
        password: z.string(),
      })
    )
    .default([]),
  dctUrl: z.string().optional(),
  timeoutSecs: z.number().optional(),
  jobPollIntervalSecs: z.number().optional(),
  dctPollIntervalSecs: z.number().optional(),
  apiVersion: z
    .object({ major: z.number(), minor: z.number(), micro: z.number() })
    .optional(),
  userAgent: z.string().optional(),
});

export type ConfigFile = z.infer<typeof fileSchema>;

/**
 * Creates a default configuration with no engines.
 */
export function createDefaultConfig(): PluginConfiguration {
  return {
    engines: [],
    timeout: DEFAULT_TIMEOUT,
    jobPollInterval: DEFAULT_JOB_POLL_INTERVAL,
    dctPollInterval: DEFAULT_DCT_POLL_INTERVAL,
    apiVersion: { ...DEFAULT_API_VERSION },
    userAgent: DEFAULT_USER_AGENT,
  };
}

/**
 * Validates a configuration.
 * @throws {DelphixError} If the configuration is invalid.
 */
export function validateConfig(config: PluginConfiguration): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw DelphixError.configuration(`Invalid configuration: ${issues.join(', ')}`);
  }
}

/**
 * Finds an engine by name.
 */
export function findEngine(
  config: PluginConfiguration,
  name: string
): EngineDefinition | undefined {
  return config.engines.find((engine) => engine.name === name);
}

/**
 * Builder for PluginConfiguration.
 */
export class PluginConfigurationBuilder {
  private config: PluginConfiguration;

  constructor() {
    this.config = createDefaultConfig();
  }

  /**
   * Adds an engine, replacing any engine already registered under the name.
   */
  engine(name: string, address: string, username: string, password: string): this {
    this.config.engines = [
      ...this.config.engines.filter((e) => e.name !== name),
      { name, address, username, password: new SecretString(password) },
    ];
    return this;
  }

  dctUrl(url: string): this {
    this.config.dctUrl = url.replace(/\/+$/, '');
    return this;
  }

  timeout(timeout: number): this {
    this.config.timeout = timeout;
    return this;
  }

  jobPollInterval(interval: number): this {
    this.config.jobPollInterval = interval;
    return this;
  }

  dctPollInterval(interval: number): this {
    this.config.dctPollInterval = interval;
    return this;
  }

  apiVersion(version: ApiVersion): this {
    this.config.apiVersion = { ...version };
    return this;
  }

  userAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws {DelphixError} If the configuration is invalid.
   */
  build(): PluginConfiguration {
    validateConfig(this.config);
    return { ...this.config, engines: [...this.config.engines] };
  }
}

function secondsFromEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) {
    return undefined;
  }
  const value = parseInt(raw, 10);
  return isNaN(value) ? undefined : value * 1000;
}

/**
 * Creates a configuration builder from environment variables.
 *
 * Environment variables:
 * - DELPHIX_ENGINE_NAME: Engine name (default: "default")
 * - DELPHIX_ENGINE_URL: Engine address
 * - DELPHIX_ENGINE_USERNAME / DELPHIX_ENGINE_PASSWORD: Engine login
 * - DELPHIX_DCT_URL: DCT API base URL
 * - DELPHIX_TIMEOUT_SECS: Request timeout in seconds
 * - DELPHIX_JOB_POLL_INTERVAL_SECS / DELPHIX_DCT_POLL_INTERVAL_SECS: Poll intervals
 * - DELPHIX_USER_AGENT: Custom User-Agent string
 *
 * The engine is only registered when its address, username and password are all set.
 */
export function createConfigFromEnv(): PluginConfigurationBuilder {
  const builder = new PluginConfigurationBuilder();

  const address = process.env.DELPHIX_ENGINE_URL;
  const username = process.env.DELPHIX_ENGINE_USERNAME;
  const password = process.env.DELPHIX_ENGINE_PASSWORD;
  if (address && username && password) {
    builder.engine(process.env.DELPHIX_ENGINE_NAME || 'default', address, username, password);
  }

  const dctUrl = process.env.DELPHIX_DCT_URL;
  if (dctUrl) {
    builder.dctUrl(dctUrl);
  }

  const timeout = secondsFromEnv('DELPHIX_TIMEOUT_SECS');
  if (timeout !== undefined) {
    builder.timeout(timeout);
  }

  const jobPoll = secondsFromEnv('DELPHIX_JOB_POLL_INTERVAL_SECS');
  if (jobPoll !== undefined) {
    builder.jobPollInterval(jobPoll);
  }

  const dctPoll = secondsFromEnv('DELPHIX_DCT_POLL_INTERVAL_SECS');
  if (dctPoll !== undefined) {
    builder.dctPollInterval(dctPoll);
  }

  const userAgent = process.env.DELPHIX_USER_AGENT;
  if (userAgent) {
    builder.userAgent(userAgent);
  }

  return builder;
}

/**
 * Creates a configuration builder from a parsed configuration file.
 * @throws {DelphixError} If the file content does not match the expected shape.
 */
export function createConfigFromObject(content: unknown): PluginConfigurationBuilder {
  const parsed = fileSchema.safeParse(content);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw DelphixError.configuration(`Invalid configuration file: ${issues.join(', ')}`);
  }

  const file = parsed.data;
  const builder = new PluginConfigurationBuilder();

  for (const engine of file.engines) {
    builder.engine(engine.name, engine.address, engine.username, engine.password);
  }
  if (file.dctUrl) {
    builder.dctUrl(file.dctUrl);
  }
  if (file.timeoutSecs !== undefined) {
    builder.timeout(file.timeoutSecs * 1000);
  }
  if (file.jobPollIntervalSecs !== undefined) {
    builder.jobPollInterval(file.jobPollIntervalSecs * 1000);
  }
  if (file.dctPollIntervalSecs !== undefined) {
    builder.dctPollInterval(file.dctPollIntervalSecs * 1000);
  }
  if (file.apiVersion) {
    builder.apiVersion(file.apiVersion);
  }
  if (file.userAgent) {
    builder.userAgent(file.userAgent);
  }

  return builder;
}

/**
 * Loads and validates a JSON configuration file.
 */
export async function loadConfigFile(path: string): Promise<PluginConfiguration> {
  const raw = await readFile(path, 'utf8');
  let content: unknown;
  try {
    content = JSON.parse(raw);
  } catch (error) {
    throw DelphixError.configuration(
      `Configuration file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return createConfigFromObject(content).build();
}
