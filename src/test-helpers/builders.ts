/**
 * Test Data Builders
 *
 * Factory functions for creating common test objects with sensible defaults.
 */

import { MockInputDevice, MockScreenCapture } from '../input/mock-device.js';
import { MonitorHub } from '../monitor/hub.js';
import { ActionQueue, type ActionQueueOptions } from '../queue/action-queue.js';
import type { Action, ActionRequest } from '../actions/types.js';
import { FAST_TIMINGS, TEST_REQUEST_ID_PREFIX } from './constants.js';

let requestCounter = 0;

/**
 * Build an ActionRequest with a unique id. Defaults to a left click.
 */
export function buildActionRequest(action: Action = { type: 'left_click' }, id?: string): ActionRequest {
  requestCounter++;
  return { id: id ?? `${TEST_REQUEST_ID_PREFIX}${requestCounter}`, action };
}

export interface TestQueue {
  queue: ActionQueue;
  device: MockInputDevice;
  capture: MockScreenCapture;
  monitor: MonitorHub;
}

/**
 * Build an ActionQueue over mock backends with fast timings. The queue is
 * not started.
 */
export function buildTestQueue(overrides?: Partial<ActionQueueOptions>): TestQueue {
  const device = new MockInputDevice();
  const capture = new MockScreenCapture();
  const monitor = new MonitorHub();
  const queue = new ActionQueue({
    device,
    capture,
    monitor,
    timings: FAST_TIMINGS,
    ...overrides,
  });
  return { queue, device, capture, monitor };
}
