/**
 * Action Handlers
 *
 * One handler per action kind. Each runs as a fixed sequence of device steps
 * with scheduled waits between them, while the worker holds exclusive access
 * to the device. Handlers throw ActionFailure; the worker turns that into an
 * ActionResult.
 */

import sharp from 'sharp';
import {
  ACTION_DELAY_MS,
  DOUBLE_CLICK_DELAY_MS,
  DRAG_STEP_DELAY_MS,
  SCREENSHOT_DELAY_MS,
  WORKER_IDLE_MS,
} from '../constants.js';
import { ActionFailure, errorMessage, executionFailed, invalidInput } from '../actions/errors.js';
import type { Action, ActionKind, ActionOf, ActionOutput } from '../actions/types.js';
import { KeyParseError, parseKeyCombo } from '../input/keys.js';
import type { InputDevice, KeyCombo, MouseButton, RawFrame, ScreenCapture } from '../input/types.js';
import { planDragPath } from './drag-path.js';

export interface ActionTimings {
  /** Settle delay before each action and between press/release steps */
  actionDelayMs: number;
  /** Extra settle before a frame capture */
  screenshotDelayMs: number;
  /** Gap inside and between the clicks of a double click, and around a drag */
  doubleClickDelayMs: number;
  /** Pacing between interpolated drag moves */
  dragStepDelayMs: number;
  /** Worker idle time between polls */
  idleMs: number;
}

export const DEFAULT_TIMINGS: ActionTimings = {
  actionDelayMs: ACTION_DELAY_MS,
  screenshotDelayMs: SCREENSHOT_DELAY_MS,
  doubleClickDelayMs: DOUBLE_CLICK_DELAY_MS,
  dragStepDelayMs: DRAG_STEP_DELAY_MS,
  idleMs: WORKER_IDLE_MS,
};

export interface HandlerContext {
  device: InputDevice;
  capture: ScreenCapture;
  timings: ActionTimings;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run one device step, converting a device error into execution_failed.
 */
async function step<T>(kind: ActionKind, name: string, op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (error) {
    throw new ActionFailure(executionFailed(`${kind} failed at ${name}: ${errorMessage(error)}`));
  }
}

// ============================================
// Pointer
// ============================================

/** press → settle → release. A failed press skips the release. */
async function click(ctx: HandlerContext, kind: ActionKind, button: MouseButton, settleMs: number): Promise<void> {
  await step(kind, `${button} press`, () => ctx.device.button(button, 'press'));
  await sleep(settleMs);
  await step(kind, `${button} release`, () => ctx.device.button(button, 'release'));
}

async function handleDoubleClick(ctx: HandlerContext): Promise<ActionOutput> {
  const gap = ctx.timings.doubleClickDelayMs;

  try {
    await click(ctx, 'double_click', 'left', gap);
  } catch (error) {
    throw new ActionFailure(executionFailed(`Failed to execute first click: ${errorMessage(error)}`));
  }

  await sleep(gap);

  try {
    await click(ctx, 'double_click', 'left', gap);
  } catch (error) {
    throw new ActionFailure(executionFailed(`Failed to execute second click: ${errorMessage(error)}`));
  }

  return null;
}

async function handleDrag(ctx: HandlerContext, action: ActionOf<'left_click_drag'>): Promise<ActionOutput> {
  const { device, timings } = ctx;
  const kind = action.type;

  await step(kind, 'left press', () => device.button('left', 'press'));
  await sleep(timings.doubleClickDelayMs);

  // Everything after the press must leave the button released on failure
  try {
    const start = await step(kind, 'cursor query', () => device.location());
    const path = planDragPath(start, { x: action.x, y: action.y });

    const { dx, dy } = path.step;

    for (let i = 1; i < path.length; i++) {
      await step(kind, `move ${i}/${path.length}`, () => device.moveMouse(dx, dy, 'relative'));
      await sleep(timings.dragStepDelayMs);
    }
    await step(kind, 'final move', () => device.moveMouse(action.x, action.y, 'absolute'));
  } catch (error) {
    try {
      await device.button('left', 'release');
    } catch (releaseError) {
      console.warn(`[ActionQueue] Button release after failed drag also failed: ${errorMessage(releaseError)}`);
    }
    throw error;
  }

  await sleep(timings.doubleClickDelayMs);
  await step(kind, 'left release', () => device.button('left', 'release'));
  return null;
}

// ============================================
// Keyboard
// ============================================

function nonAscii(text: string): string[] {
  return [...text].filter((char) => (char.codePointAt(0) ?? 0) > 0x7f);
}

async function handleTypeText(ctx: HandlerContext, action: ActionOf<'type_text'>): Promise<ActionOutput> {
  const { text } = action;
  if (text.length === 0) {
    throw new ActionFailure(invalidInput('Text cannot be empty'));
  }

  try {
    await ctx.device.text(text);
  } catch (error) {
    const message = errorMessage(error);
    const offending = nonAscii(text);
    if (offending.length > 0) {
      throw new ActionFailure(
        executionFailed(
          `Input simulation failed. This might be because the text contains non-ASCII characters ` +
            `(${JSON.stringify(offending)}) which may not be supported by your system. Original error: ${message}`
        )
      );
    }
    throw new ActionFailure(executionFailed(`Input simulation failed: ${message}`));
  }
  return null;
}

function parseCombo(key: string): KeyCombo {
  try {
    return parseKeyCombo(key);
  } catch (error) {
    if (error instanceof KeyParseError) {
      throw new ActionFailure(invalidInput(`Invalid key format or key not found: ${key}`));
    }
    throw error;
  }
}

/**
 * Modifiers down in listed order, main key down and up, modifiers up in
 * reverse order. The first failing step aborts the rest.
 */
async function handleKeyPress(ctx: HandlerContext, action: ActionOf<'key_press'>): Promise<ActionOutput> {
  const { device, timings } = ctx;
  const kind = action.type;

  const combo = parseCombo(action.key);

  for (const modifier of combo.modifiers) {
    await step(kind, `${modifier} press`, () => device.key({ kind: 'named', name: modifier }, 'press'));
    await sleep(timings.actionDelayMs);
  }

  await step(kind, 'key press', () => device.key(combo.key, 'press'));
  await sleep(timings.actionDelayMs);

  await step(kind, 'key release', () => device.key(combo.key, 'release'));
  await sleep(timings.actionDelayMs);

  for (const modifier of [...combo.modifiers].reverse()) {
    await step(kind, `${modifier} release`, () => device.key({ kind: 'named', name: modifier }, 'release'));
    await sleep(timings.actionDelayMs);
  }

  return null;
}

// ============================================
// Queries
// ============================================

/**
 * Encode a frame losslessly as PNG, base64 for JSON transport.
 */
export async function encodeFrame(frame: RawFrame): Promise<string> {
  const png = await sharp(frame.data, {
    raw: { width: frame.width, height: frame.height, channels: 4 },
  })
    .png({ compressionLevel: 6 })
    .toBuffer();
  return png.toString('base64');
}

async function handleScreenshot(ctx: HandlerContext): Promise<ActionOutput> {
  await sleep(ctx.timings.screenshotDelayMs);

  const frame = await step('screenshot', 'capture', () => ctx.capture.captureFrame());
  const image = await step('screenshot', 'encode', () => encodeFrame(frame));
  return { image };
}

async function handleCursorPosition(ctx: HandlerContext): Promise<ActionOutput> {
  const { x, y } = await step('cursor_position', 'cursor query', () => ctx.device.location());
  return { x, y };
}

// ============================================
// Dispatch
// ============================================

export async function handleAction(ctx: HandlerContext, action: Action): Promise<ActionOutput> {
  switch (action.type) {
    case 'left_click':
      await click(ctx, action.type, 'left', ctx.timings.actionDelayMs);
      return null;
    case 'right_click':
      await click(ctx, action.type, 'right', ctx.timings.actionDelayMs);
      return null;
    case 'middle_click':
      await click(ctx, action.type, 'middle', ctx.timings.actionDelayMs);
      return null;
    case 'double_click':
      return handleDoubleClick(ctx);
    case 'mouse_move':
      await step(action.type, 'move', () => ctx.device.moveMouse(action.x, action.y, 'absolute'));
      return null;
    case 'left_click_drag':
      return handleDrag(ctx, action);
    case 'type_text':
      return handleTypeText(ctx, action);
    case 'key_press':
      return handleKeyPress(ctx, action);
    case 'screenshot':
      return handleScreenshot(ctx);
    case 'cursor_position':
      return handleCursorPosition(ctx);
  }
}
