/**
 * Status types for engine jobs, engine actions and DCT jobs.
 *
 * Each family has exactly one "still running" sentinel that the poller
 * waits on; every other value is treated as terminal.
 *
 * @module status
 */

/**
 * Legacy engine job state (`Job.jobState`).
 */
export enum JobState {
  Running = 'RUNNING',
  Suspended = 'SUSPENDED',
  Canceled = 'CANCELED',
  Completed = 'COMPLETED',
  Failed = 'FAILED',
  Unknown = 'UNKNOWN',
}

/**
 * Converts a string to a JobState enum value.
 *
 * @example
 * jobStateFromString('completed'); // JobState.Completed
 * jobStateFromString(undefined);   // JobState.Unknown
 */
export function jobStateFromString(value: string | null | undefined): JobState {
  if (!value) {
    return JobState.Unknown;
  }

  switch (value.toUpperCase()) {
    case 'RUNNING':
      return JobState.Running;
    case 'SUSPENDED':
      return JobState.Suspended;
    case 'CANCELED':
    case 'CANCELLED':
      return JobState.Canceled;
    case 'COMPLETED':
      return JobState.Completed;
    case 'FAILED':
      return JobState.Failed;
    default:
      return JobState.Unknown;
  }
}

/**
 * Legacy engine action state (`Action.state`).
 */
export enum ActionState {
  Executing = 'EXECUTING',
  Waiting = 'WAITING',
  Completed = 'COMPLETED',
  Failed = 'FAILED',
  Canceled = 'CANCELED',
  Unknown = 'UNKNOWN',
}

export function actionStateFromString(value: string | null | undefined): ActionState {
  if (!value) {
    return ActionState.Unknown;
  }

  switch (value.toUpperCase()) {
    case 'EXECUTING':
      return ActionState.Executing;
    case 'WAITING':
      return ActionState.Waiting;
    case 'COMPLETED':
      return ActionState.Completed;
    case 'FAILED':
      return ActionState.Failed;
    case 'CANCELED':
    case 'CANCELLED':
      return ActionState.Canceled;
    default:
      return ActionState.Unknown;
  }
}

/**
 * Every status a DCT job can report.
 */
export const DCT_JOB_STATUSES = [
  'PENDING',
  'STARTED',
  'WAITING',
  'RUNNING',
  'TIMEDOUT',
  'COMPLETED',
  'FAILED',
  'CANCELED',
  'ABANDONED',
  'SUSPENDED',
] as const;

/**
 * DCT job status.
 */
export type DctJobStatus = (typeof DCT_JOB_STATUSES)[number];

/**
 * True while a legacy job is still running.
 */
export function isJobRunning(state: JobState): boolean {
  return state === JobState.Running;
}

/**
 * True while an action is executing or queued behind another one.
 */
export function isActionRunning(state: ActionState): boolean {
  return state === ActionState.Executing || state === ActionState.Waiting;
}

/**
 * True once an action has reached `COMPLETED`.
 */
export function isActionCompleted(state: ActionState): boolean {
  return state === ActionState.Completed;
}

/**
 * True while a DCT job is still in progress.
 *
 * DCT reports an in-flight job as `STARTED`; the poller treats anything
 * else as the job having settled.
 */
export function isDctJobRunning(status: DctJobStatus): boolean {
  return status === 'STARTED';
}
