/**
 * Action Responses
 *
 * Creators for the one response every request receives.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Action, ActionError, ActionOutput, ActionResponse, ActionResult } from './types.js';

/**
 * Create a success response. A null output leaves `data` off the response.
 */
export function createSuccessResponse(
  requestId: string,
  action: Action,
  output: ActionOutput
): ActionResponse {
  const response: ActionResponse = {
    id: uuidv4(),
    request_id: requestId,
    timestamp: new Date().toISOString(),
    status: 'success',
    action,
  };
  if (output !== null) {
    response.data = output;
  }
  return Object.freeze(response);
}

/**
 * Create an error response
 */
export function createErrorResponse(requestId: string, action: Action, error: ActionError): ActionResponse {
  return Object.freeze({
    id: uuidv4(),
    request_id: requestId,
    timestamp: new Date().toISOString(),
    status: 'error' as const,
    action,
    error,
  });
}

export function responseFromResult(requestId: string, action: Action, result: ActionResult): ActionResponse {
  return result.success
    ? createSuccessResponse(requestId, action, result.output)
    : createErrorResponse(requestId, action, result.error);
}
