/**
 * Action Request Validation
 *
 * Zod schemas for incoming action requests. Parsed actions are frozen so the
 * queue, the handlers and the monitor all see the same immutable value.
 */

import { z } from 'zod';
import { MAX_COORDINATE } from '../constants.js';
import type { ActionRequest } from './types.js';

const coordinate = z.number().int().nonnegative().max(MAX_COORDINATE);

const ActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('left_click') }),
  z.object({ type: z.literal('right_click') }),
  z.object({ type: z.literal('middle_click') }),
  z.object({ type: z.literal('double_click') }),
  z.object({ type: z.literal('mouse_move'), x: coordinate, y: coordinate }),
  z.object({ type: z.literal('left_click_drag'), x: coordinate, y: coordinate }),
  // Empty text is accepted here and rejected by the handler as invalid_input
  z.object({ type: z.literal('type_text'), text: z.string() }),
  z.object({ type: z.literal('key_press'), key: z.string() }),
  z.object({ type: z.literal('screenshot') }),
  z.object({ type: z.literal('cursor_position') }),
]);

const ActionRequestSchema = z.object({
  id: z.string().min(1),
  action: ActionSchema,
});

const SessionRequestSchema = z.object({
  clear_existing: z.boolean().optional(),
});

export type SessionRequest = z.infer<typeof SessionRequestSchema>;

export type ParseResult<T> = { success: true; data: T } | { success: false; issues: string[] };

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function parseActionRequest(input: unknown): ParseResult<ActionRequest> {
  const result = ActionRequestSchema.safeParse(input);
  if (!result.success) {
    return { success: false, issues: formatIssues(result.error) };
  }
  return {
    success: true,
    data: Object.freeze({ id: result.data.id, action: Object.freeze(result.data.action) }),
  };
}

export function parseSessionRequest(input: unknown): ParseResult<SessionRequest> {
  const result = SessionRequestSchema.safeParse(input ?? {});
  if (!result.success) {
    return { success: false, issues: formatIssues(result.error) };
  }
  return { success: true, data: result.data };
}
