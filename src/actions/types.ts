/**
 * Action Types
 *
 * Wire-compatible shapes for action requests, results and responses.
 * Field names are snake_case where they cross the network.
 */

// ============================================
// Action Types
// ============================================

export interface PointerTarget {
  x: number;
  y: number;
}

export type Action =
  | { type: 'left_click' }
  | { type: 'right_click' }
  | { type: 'middle_click' }
  | { type: 'double_click' }
  | ({ type: 'mouse_move' } & PointerTarget)
  | ({ type: 'left_click_drag' } & PointerTarget)
  | { type: 'type_text'; text: string }
  | { type: 'key_press'; key: string }
  | { type: 'screenshot' }
  | { type: 'cursor_position' };

/** The tag of an action, ignoring its payload. */
export type ActionKind = Action['type'];

export type ActionOf<K extends ActionKind> = Extract<Action, { type: K }>;

export interface ActionRequest {
  id: string;
  action: Action;
}

// ============================================
// Output & Error Types
// ============================================

export interface ScreenshotOutput {
  image: string;
}

export interface CursorPositionOutput {
  x: number;
  y: number;
}

/** `null` stands for "no data"; it is never serialized. */
export type ActionOutput = ScreenshotOutput | CursorPositionOutput | null;

export type ActionErrorType = 'timeout' | 'execution_failed' | 'invalid_input' | 'channel_error';

export interface ActionError {
  type: ActionErrorType;
  message: string;
}

/**
 * Device-side outcome of one action, delivered on the completion handle.
 */
export type ActionResult =
  | { success: true; output: ActionOutput }
  | { success: false; error: ActionError };

// ============================================
// Response Types
// ============================================

export type ActionResponseStatus = 'success' | 'error';

export interface ActionResponse {
  id: string;
  request_id: string;
  timestamp: string;
  status: ActionResponseStatus;
  action: Action;
  data?: ScreenshotOutput | CursorPositionOutput;
  error?: ActionError;
}
