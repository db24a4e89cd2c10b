/**
 * HTTP API tests
 *
 * Exercises the Hono app in-process through app.request, over mock input
 * backends. Nothing listens on a port.
 */

import os from 'os';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { RemoteControlServer, statusForResponse, INVALID_SESSION_MESSAGE, SESSION_CONFLICT_MESSAGE } from './index.js';
import { SessionManager } from '../session/manager.js';
import { createErrorResponse, createSuccessResponse } from '../actions/responses.js';
import {
  buildActionRequest,
  buildTestQueue,
  DEFAULT_TEST_PORT,
  TEST_ORIGIN,
  type TestQueue,
} from '../test-helpers/index.js';

const TEST_DISPLAY = { width: 4, height: 3 };

const SessionBody = z.object({ session_id: z.string().uuid() });
const InvalidRequestBody = z.object({ error: z.string(), details: z.array(z.string()) });

function jsonRequest(method: string, body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

describe('RemoteControlServer routes', () => {
  let setup: TestQueue;
  let sessions: SessionManager;
  let server: RemoteControlServer;

  beforeEach(() => {
    setup = buildTestQueue();
    sessions = new SessionManager();
    server = new RemoteControlServer({
      port: DEFAULT_TEST_PORT,
      queue: setup.queue,
      sessions,
      monitor: setup.monitor,
      display: TEST_DISPLAY,
      allowedOrigins: [TEST_ORIGIN],
    });
  });

  afterEach(async () => {
    await setup.queue.stop();
  });

  async function openSession(): Promise<string> {
    const res = await server.app.request('/v1/session', jsonRequest('POST', {}));
    return SessionBody.parse(await res.json()).session_id;
  }

  describe('service endpoints', () => {
    it('GET / reports the service is running', async () => {
      const res = await server.app.request('/');
      expect(res.status).toBe(200);
      expect(await res.text()).toBe('deskrelay is running');
    });

    it('GET /health returns ok', async () => {
      const res = await server.app.request('/health');
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: 'ok' });
    });

    it('GET /v1/system/info reports the OS and display size', async () => {
      const res = await server.app.request('/v1/system/info');
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        os_type: os.type(),
        os_version: os.release(),
        display_width: 4,
        display_height: 3,
      });
    });

    it('GET /v1/monitor without an upgrade answers 426', async () => {
      const res = await server.app.request('/v1/monitor');
      expect(res.status).toBe(426);
    });
  });

  describe('sessions', () => {
    it('creates a session from an empty body', async () => {
      const res = await server.app.request('/v1/session', { method: 'POST' });
      expect(res.status).toBe(200);

      const body = SessionBody.parse(await res.json());
      expect(sessions.current()?.id).toBe(body.session_id);
    });

    it('refuses a second session with 409', async () => {
      await openSession();

      const res = await server.app.request('/v1/session', jsonRequest('POST', { clear_existing: false }));
      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({ error: SESSION_CONFLICT_MESSAGE });
    });

    it('replaces the active session when clear_existing is set', async () => {
      const first = await openSession();

      const res = await server.app.request('/v1/session', jsonRequest('POST', { clear_existing: true }));
      expect(res.status).toBe(200);

      const body = SessionBody.parse(await res.json());
      expect(body.session_id).not.toBe(first);
    });

    it('rejects a malformed session request', async () => {
      const res = await server.app.request('/v1/session', jsonRequest('POST', { clear_existing: 'yes' }));
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: 'Invalid session request' });
    });

    it('DELETE requires the current session id', async () => {
      const res = await server.app.request('/v1/session', { method: 'DELETE' });
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: INVALID_SESSION_MESSAGE });
    });

    it('DELETE ends the session', async () => {
      const sessionId = await openSession();

      const res = await server.app.request('/v1/session', {
        method: 'DELETE',
        headers: { 'X-Session-ID': sessionId },
      });
      expect(res.status).toBe(200);
      expect(sessions.current()).toBeNull();
    });
  });

  describe('POST /v1/action', () => {
    it('rejects a request without a session with an error response', async () => {
      const request = buildActionRequest({ type: 'left_click' });

      const res = await server.app.request('/v1/action', jsonRequest('POST', request));

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({
        request_id: request.id,
        status: 'error',
        action: { type: 'left_click' },
        error: { type: 'invalid_input', message: INVALID_SESSION_MESSAGE },
      });
      expect(setup.device.operations).toEqual([]);
    });

    it('rejects a stale session id', async () => {
      await openSession();

      const res = await server.app.request(
        '/v1/action',
        jsonRequest('POST', buildActionRequest(), { 'X-Session-ID': 'not-the-session' })
      );
      expect(res.status).toBe(401);
    });

    it('executes the action and answers 200', async () => {
      setup.queue.start();
      const sessionId = await openSession();
      const request = buildActionRequest({ type: 'mouse_move', x: 10, y: 20 });

      const res = await server.app.request('/v1/action', jsonRequest('POST', request, { 'X-Session-ID': sessionId }));

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        request_id: request.id,
        status: 'success',
        action: { type: 'mouse_move', x: 10, y: 20 },
      });
      expect(setup.device.mousePosition).toEqual({ x: 10, y: 20 });
    });

    it('answers 422 for invalid input', async () => {
      setup.queue.start();
      const sessionId = await openSession();

      const res = await server.app.request(
        '/v1/action',
        jsonRequest('POST', buildActionRequest({ type: 'type_text', text: '' }), { 'X-Session-ID': sessionId })
      );

      expect(res.status).toBe(422);
      expect(await res.json()).toMatchObject({ error: { type: 'invalid_input', message: 'Text cannot be empty' } });
    });

    it('answers 500 when the device fails', async () => {
      setup.queue.start();
      setup.device.injectFailure('button_middle_press');
      const sessionId = await openSession();

      const res = await server.app.request(
        '/v1/action',
        jsonRequest('POST', buildActionRequest({ type: 'middle_click' }), { 'X-Session-ID': sessionId })
      );

      expect(res.status).toBe(500);
      expect(await res.json()).toMatchObject({ error: { type: 'execution_failed' } });
    });

    it('answers 408 when the action times out', async () => {
      const slow = buildTestQueue({ timeoutMs: 10 });
      const slowServer = new RemoteControlServer({
        port: DEFAULT_TEST_PORT,
        queue: slow.queue,
        sessions,
        monitor: slow.monitor,
        display: TEST_DISPLAY,
      });
      const sessionId = await openSession();

      // queue never started
      const res = await slowServer.app.request(
        '/v1/action',
        jsonRequest('POST', buildActionRequest(), { 'X-Session-ID': sessionId })
      );

      expect(res.status).toBe(408);
      expect(await res.json()).toMatchObject({ error: { type: 'timeout', message: 'Action timed out' } });
    });

    it('rejects malformed JSON with 400', async () => {
      const res = await server.app.request('/v1/action', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{not json',
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Invalid JSON body' });
    });

    it('rejects an unknown action type with details', async () => {
      const res = await server.app.request('/v1/action', jsonRequest('POST', { id: 'req-x', action: { type: 'fly' } }));
      expect(res.status).toBe(400);

      const body = InvalidRequestBody.parse(await res.json());
      expect(body.error).toBe('Invalid action request');
      expect(body.details).toHaveLength(1);
    });

    it('rejects negative coordinates', async () => {
      const res = await server.app.request(
        '/v1/action',
        jsonRequest('POST', { id: 'req-x', action: { type: 'mouse_move', x: -1, y: 0 } })
      );
      expect(res.status).toBe(400);
    });
  });

  describe('CORS', () => {
    it('echoes an allowed origin', async () => {
      const res = await server.app.request('/health', { headers: { Origin: TEST_ORIGIN } });
      expect(res.headers.get('Access-Control-Allow-Origin')).toBe(TEST_ORIGIN);
    });

    it('omits the header for other origins', async () => {
      const res = await server.app.request('/health', { headers: { Origin: 'http://evil.example' } });
      expect(res.headers.get('Access-Control-Allow-Origin')).toBeNull();
    });

    it('allows any origin when none are configured', () => {
      const open = new RemoteControlServer({
        port: DEFAULT_TEST_PORT,
        queue: setup.queue,
        sessions,
        monitor: setup.monitor,
        display: TEST_DISPLAY,
      });
      expect(open.isOriginAllowed('http://anything.example')).toBe(true);
      expect(server.isOriginAllowed('http://anything.example')).toBe(false);
    });
  });
});

describe('statusForResponse', () => {
  const action = { type: 'left_click' } as const;

  it('maps each outcome to its HTTP status', () => {
    expect(statusForResponse(createSuccessResponse('r', action, null))).toBe(200);
    expect(statusForResponse(createErrorResponse('r', action, { type: 'invalid_input', message: 'x' }))).toBe(422);
    expect(statusForResponse(createErrorResponse('r', action, { type: 'timeout', message: 'x' }))).toBe(408);
    expect(statusForResponse(createErrorResponse('r', action, { type: 'execution_failed', message: 'x' }))).toBe(500);
    expect(statusForResponse(createErrorResponse('r', action, { type: 'channel_error', message: 'x' }))).toBe(500);
  });
});
