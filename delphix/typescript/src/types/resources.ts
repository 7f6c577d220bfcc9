/**
 * Resource types for the legacy engine API.
 *
 * The engine wraps every answer in an envelope (`OKResult` or
 * `ErrorResult`). The value objects below are parsed out of the envelope's
 * `result` and are never mutated locally; a fresh copy is built for every
 * request.
 *
 * @module resources
 */

import { z } from 'zod';
import { DelphixError } from './errors.js';
import {
  ActionState,
  JobState,
  actionStateFromString,
  jobStateFromString,
} from './status.js';

const okEnvelopeSchema = z.object({
  type: z.string(),
  status: z.literal('OK'),
  result: z.unknown(),
  job: z.string().nullable().optional(),
  action: z.string().nullable().optional(),
});

const errorEnvelopeSchema = z.object({
  type: z.string(),
  status: z.literal('ERROR'),
  error: z
    .object({
      details: z.unknown(),
      id: z.string().optional(),
      action: z.string().optional(),
    })
    .passthrough(),
});

/**
 * Successful engine response.
 */
export interface EngineResponse {
  /** Envelope type (normally "OKResult" or "ListResult"). */
  readonly type: string;
  readonly status: 'OK';
  /** Operation payload. A list for collection GETs, an object for single GETs, a reference for creates. */
  readonly result: unknown;
  /** Job started by the operation, if any. */
  readonly job: string | null;
  /** Action recorded for the operation, if any. */
  readonly action: string | null;
}

/**
 * Parses a raw engine envelope.
 *
 * @throws DelphixError of kind `EngineError` for an `ErrorResult`, or
 *   `DeserializationError` when the body is not an envelope at all.
 */
export function parseEngineResponse(body: unknown): EngineResponse {
  const failed = errorEnvelopeSchema.safeParse(body);
  if (failed.success) {
    const { details, id } = failed.data.error;
    const message = typeof details === 'string' ? details : JSON.stringify(details);
    throw DelphixError.engine(message, id);
  }

  const ok = okEnvelopeSchema.safeParse(body);
  if (!ok.success) {
    throw DelphixError.deserialization(
      `Unexpected engine response: ${ok.error.issues.map((i) => i.message).join(', ')}`
    );
  }

  return {
    type: ok.data.type,
    status: 'OK',
    result: ok.data.result,
    job: ok.data.job ?? null,
    action: ok.data.action ?? null,
  };
}

/**
 * Validates `value` against `schema`, raising a deserialization error naming `what`.
 */
export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  what: string
): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw DelphixError.deserialization(`Invalid ${what}: ${issues.join(', ')}`);
  }
  return parsed.data;
}

// ============================================================================
// Self Service
// ============================================================================

const bookmarkSchema = z.object({
  reference: z.string(),
  name: z.string(),
  branch: z.string().nullable().optional(),
  container: z.string().nullable().optional(),
  template: z.string().nullable().optional(),
  timestamp: z.string().nullable().optional(),
  description: z.string().nullable().optional(),
  shared: z.boolean().optional(),
});

/**
 * A saved point-in-time reference within a Self Service data branch.
 */
export interface SelfServiceBookmark {
  readonly reference: string;
  readonly name: string;
  readonly branch: string | null;
  readonly container: string | null;
  readonly template: string | null;
  readonly timestamp: string | null;
  readonly description: string | null;
  readonly shared: boolean;
}

export function parseSelfServiceBookmark(json: unknown): SelfServiceBookmark {
  const data = parseWith(bookmarkSchema, json, 'Self Service bookmark');
  return {
    reference: data.reference,
    name: data.name,
    branch: data.branch ?? null,
    container: data.container ?? null,
    template: data.template ?? null,
    timestamp: data.timestamp ?? null,
    description: data.description ?? null,
    shared: data.shared ?? false,
  };
}

const containerSchema = z.object({
  reference: z.string(),
  name: z.string(),
  activeBranch: z.string(),
  template: z.string().nullable().optional(),
  state: z.string().nullable().optional(),
  lastUpdated: z.string().nullable().optional(),
});

/**
 * A Self Service data container.
 */
export interface SelfServiceContainer {
  readonly reference: string;
  readonly name: string;
  readonly activeBranch: string;
  readonly template: string | null;
  readonly state: string | null;
  readonly lastUpdated: string | null;
}

export function parseSelfServiceContainer(json: unknown): SelfServiceContainer {
  const data = parseWith(containerSchema, json, 'Self Service container');
  return {
    reference: data.reference,
    name: data.name,
    activeBranch: data.activeBranch,
    template: data.template ?? null,
    state: data.state ?? null,
    lastUpdated: data.lastUpdated ?? null,
  };
}

// ============================================================================
// Jobs and actions
// ============================================================================

const jobEventSchema = z.object({
  messageDetails: z.string().nullable().optional(),
  eventType: z.string().nullable().optional(),
  timestamp: z.string().nullable().optional(),
});

const jobSchema = z.object({
  reference: z.string(),
  jobState: z.string(),
  title: z.string().nullable().optional(),
  percentComplete: z.number().nullable().optional(),
  events: z.array(jobEventSchema).optional(),
});

/**
 * Snapshot of a legacy engine job.
 */
export interface JobStatus {
  readonly reference: string;
  readonly status: JobState;
  readonly title: string;
  readonly percentComplete: number;
  /** Latest event message, or "<title> <state>" when the job has no events yet. */
  readonly summary: string;
}

/**
 * The status a poll starts from before the first fetch: running, no summary.
 */
export function initialJobStatus(reference = ''): JobStatus {
  return {
    reference,
    status: JobState.Running,
    title: '',
    percentComplete: 0,
    summary: '',
  };
}

export function parseJobStatus(json: unknown): JobStatus {
  const data = parseWith(jobSchema, json, 'job');
  const status = jobStateFromString(data.jobState);
  const title = data.title ?? '';
  const events = data.events ?? [];
  const latest = events.length > 0 ? events[events.length - 1].messageDetails : null;

  return {
    reference: data.reference,
    status,
    title,
    percentComplete: data.percentComplete ?? 0,
    summary: latest ?? `${title} ${status}`.trim(),
  };
}

const actionSchema = z.object({
  reference: z.string(),
  state: z.string(),
  title: z.string().nullable().optional(),
  details: z.string().nullable().optional(),
  actionType: z.string().nullable().optional(),
});

/**
 * Snapshot of a legacy engine action.
 */
export interface ActionStatus {
  readonly reference: string;
  readonly state: ActionState;
  readonly title: string;
  readonly details: string;
  readonly actionType: string | null;
}

export function parseActionStatus(json: unknown): ActionStatus {
  const data = parseWith(actionSchema, json, 'action');
  return {
    reference: data.reference,
    state: actionStateFromString(data.state),
    title: data.title ?? '',
    details: data.details ?? '',
    actionType: data.actionType ?? null,
  };
}
