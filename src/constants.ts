/**
 * Application-wide constants
 */

export const SERVICE_NAME = 'deskrelay';

// ============================================================
// ACTION TIMING
// ============================================================

/**
 * Settle delay applied by the worker before every action, and between the
 * press/release steps of clicks and key combos.
 */
export const ACTION_DELAY_MS = 500;

/**
 * How long a caller waits for an action result before giving up.
 * The action itself is not cancelled.
 */
export const ACTION_TIMEOUT_MS = 10_000;

/**
 * Extra settle delay before capturing a frame, so the display reflects the
 * previous action.
 */
export const SCREENSHOT_DELAY_MS = 2_000;

/** Gap inside and between the two clicks of a double click. */
export const DOUBLE_CLICK_DELAY_MS = 100;

/** Pacing between the interpolated moves of a drag. */
export const DRAG_STEP_DELAY_MS = 10;

/** Worker idle time between polls of the admission list. */
export const WORKER_IDLE_MS = 10;

/** One drag step per this many pixels of euclidean distance. */
export const DRAG_STEP_PX = 10;

/**
 * Largest accepted pointer coordinate. RFB pointer events carry 16-bit
 * positions.
 */
export const MAX_COORDINATE = 0xffff;

// ============================================================
// MONITOR
// ============================================================

/**
 * Per-subscriber event buffer. A subscriber that falls further behind loses
 * its oldest events.
 */
export const MONITOR_BUFFER_CAPACITY = 100;

// ============================================================
// SESSION
// ============================================================

export const SESSION_HEADER = 'X-Session-ID';

/** Sliding session window: 30 minutes. */
export const DEFAULT_SESSION_DURATION_MS = 30 * 60 * 1000;
