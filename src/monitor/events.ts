/**
 * Monitor Events
 *
 * Event definitions and creators for the monitor stream. The worker
 * publishes one request event and one response event per executed action.
 */

import type { ActionRequest, ActionResponse } from '../actions/types.js';

export interface ActionRequestEvent {
  event_type: 'action_request';
  data: ActionRequest;
}

export interface ActionResponseEvent {
  event_type: 'action_response';
  data: ActionResponse;
}

export type MonitorEvent = ActionRequestEvent | ActionResponseEvent;

export function createActionRequestEvent(request: ActionRequest): ActionRequestEvent {
  return {
    event_type: 'action_request',
    data: request,
  };
}

export function createActionResponseEvent(response: ActionResponse): ActionResponseEvent {
  return {
    event_type: 'action_response',
    data: response,
  };
}
