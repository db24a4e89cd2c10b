/**
 * Test Constants
 *
 * Centralized constants used across test files to avoid magic numbers
 * and improve maintainability.
 */

import type { ActionTimings } from '../queue/handlers.js';

// Test Buffer Sizes
export const SMALL_TEST_BUFFER_SIZE = 5;

// Test Timing
export const TEST_TIMEOUT_MS = 2_000;

/** Near-zero handler delays so queue tests run in milliseconds. */
export const FAST_TIMINGS: ActionTimings = {
  actionDelayMs: 0,
  screenshotDelayMs: 0,
  doubleClickDelayMs: 0,
  dragStepDelayMs: 0,
  idleMs: 1,
};

// Default Test Values
export const DEFAULT_TEST_PORT = 3000;
export const ALTERNATIVE_TEST_PORT = 8080;
export const DEFAULT_BIND_ADDRESS = '127.0.0.1';

// Test Identifiers Prefixes
export const TEST_REQUEST_ID_PREFIX = 'req-';

// Common Test Strings
export const TEST_PASSWORD = 'test-secret';
export const TEST_ORIGIN = 'http://localhost:5173';
