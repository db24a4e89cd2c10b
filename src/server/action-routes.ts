/**
 * Action API Routes
 *
 * Session lifecycle and the single action RPC endpoint.
 */

import type { Context, Hono } from 'hono';
import { SESSION_HEADER } from '../constants.js';
import { invalidInput } from '../actions/errors.js';
import { createErrorResponse } from '../actions/responses.js';
import { parseActionRequest, parseSessionRequest } from '../actions/schema.js';
import type { ActionResponse } from '../actions/types.js';
import type { ActionQueue } from '../queue/action-queue.js';
import { isSessionConflict, type SessionManager } from '../session/manager.js';

export const INVALID_SESSION_MESSAGE = 'Invalid or missing session ID';
export const SESSION_CONFLICT_MESSAGE = 'Another session is already active';

export interface ActionRoutesConfig {
  queue: ActionQueue;
  sessions: SessionManager;
}

export type ActionStatusCode = 200 | 408 | 422 | 500;

/**
 * HTTP status for an action response.
 */
export function statusForResponse(response: ActionResponse): ActionStatusCode {
  if (response.status === 'success') return 200;
  switch (response.error?.type) {
    case 'invalid_input':
      return 422;
    case 'timeout':
      return 408;
    default:
      return 500;
  }
}

/**
 * Read a JSON body. An empty body reads as undefined; malformed JSON throws.
 */
async function readJsonBody(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (text.trim() === '') return undefined;
  return JSON.parse(text);
}

export function setupActionRoutes(app: Hono, config: ActionRoutesConfig): void {
  const { queue, sessions } = config;

  // ========================================================================
  // Sessions
  // ========================================================================

  app.post('/v1/session', async (c) => {
    let body: unknown;
    try {
      body = await readJsonBody(c);
    } catch {
      return c.json({ error: 'Invalid JSON body' }, 400);
    }

    const parsed = parseSessionRequest(body);
    if (!parsed.success) {
      return c.json({ error: 'Invalid session request', details: parsed.issues }, 400);
    }

    const result = sessions.createSession(parsed.data.clear_existing ?? false);
    if (isSessionConflict(result)) {
      return c.json({ error: SESSION_CONFLICT_MESSAGE }, 409);
    }
    return c.json({ session_id: result.id });
  });

  app.delete('/v1/session', (c) => {
    if (!sessions.validateAndTouch(c.req.header(SESSION_HEADER))) {
      return c.json({ error: INVALID_SESSION_MESSAGE }, 401);
    }
    sessions.clear();
    return c.json({ status: 'session_cleared' });
  });

  // ========================================================================
  // Actions
  // ========================================================================

  app.post('/v1/action', async (c) => {
    let body: unknown;
    try {
      body = await readJsonBody(c);
    } catch {
      return c.json({ error: 'Invalid JSON body' }, 400);
    }

    const parsed = parseActionRequest(body);
    if (!parsed.success) {
      return c.json({ error: 'Invalid action request', details: parsed.issues }, 400);
    }
    const request = parsed.data;

    if (!sessions.validateAndTouch(c.req.header(SESSION_HEADER))) {
      console.warn(`[API] Rejected ${request.action.type} (${request.id}): ${INVALID_SESSION_MESSAGE}`);
      return c.json(createErrorResponse(request.id, request.action, invalidInput(INVALID_SESSION_MESSAGE)), 401);
    }

    try {
      const response = await queue.execute(request);
      return c.json(response, statusForResponse(response));
    } catch (error) {
      console.error(`[API] Action ${request.id} failed unexpectedly:`, error);
      return c.json({ error: 'Internal server error' }, 500);
    }
  });
}
