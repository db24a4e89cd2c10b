/**
 * Action Errors
 *
 * Constructors for the four error kinds, plus ActionFailure: the Error
 * subclass handlers throw so a multi-step sequence can abort with a typed
 * error. The worker converts it back into an ActionResult.
 */

import type { ActionError, ActionResult } from './types.js';

export const TIMEOUT_MESSAGE = 'Action timed out';

export function timeoutError(): ActionError {
  return { type: 'timeout', message: TIMEOUT_MESSAGE };
}

export function executionFailed(message: string): ActionError {
  return { type: 'execution_failed', message };
}

export function invalidInput(message: string): ActionError {
  return { type: 'invalid_input', message };
}

export function channelError(message: string): ActionError {
  return { type: 'channel_error', message };
}

export class ActionFailure extends Error {
  readonly error: ActionError;

  constructor(error: ActionError) {
    super(error.message);
    this.name = 'ActionFailure';
    this.error = error;
  }
}

/**
 * Extract a human-readable message from anything a device call may throw.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Convert a thrown value into a failed ActionResult. Anything that is not an
 * ActionFailure is a device error.
 */
export function toFailedResult(error: unknown): ActionResult {
  if (error instanceof ActionFailure) {
    return { success: false, error: error.error };
  }
  return { success: false, error: executionFailed(errorMessage(error)) };
}
