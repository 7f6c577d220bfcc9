/**
 * Build log messages.
 * @module steps/messages
 */

export const Messages = {
  INVALID_ENGINE_ENVIRONMENT: 'Invalid Delphix Engine environment: {0}',
  UNABLE_TO_CONNECT: 'Unable to connect to engine {0}',
  UNDEFINED_BOOKMARK_OPERATION: 'Undefined Self Service Bookmark Operation',
  UNDEFINED_CONTAINER_OPERATION: 'Undefined Self Service Container Operation',
  UNDEFINED_PROVISION_TYPE: 'Undefined VDB Provision Type',
  DCT_CONFIGURATION_MISSING: 'Delphix Global Configuration Missing',
  CREDENTIALS_NOT_FOUND: 'Cannot find any credentials for {0}',
  JOB_SUBMITTED: 'Job {0} submitted',
  JOB_FINISHED: 'Job {0} finished with status {1}',
} as const;

export type MessageKey = keyof typeof Messages;

/**
 * Renders a message, replacing `{n}` with the n-th argument.
 *
 * @example
 * getMessage('UNABLE_TO_CONNECT', 'engine.example.com');
 * // "Unable to connect to engine engine.example.com"
 */
export function getMessage(key: MessageKey, ...args: string[]): string {
  return Messages[key].replace(/\{(\d+)\}/g, (match, index: string) => {
    const value = args[Number(index)];
    return value === undefined ? match : value;
  });
}
