/**
 * System information for clients sizing their coordinates.
 *
 * `os_type` and `os_version` describe the host this service runs on. With
 * the VNC backend that is the relay, not the remote desktop. The display
 * size is the one the backend reported at connect time, so this route never
 * touches the device the worker owns.
 */

import os from 'os';
import type { Hono } from 'hono';
import type { DisplaySize } from '../input/types.js';

export interface SystemInfo {
  os_type: string;
  os_version: string;
  display_width: number;
  display_height: number;
}

export function getSystemInfo(display: DisplaySize): SystemInfo {
  return {
    os_type: os.type(),
    os_version: os.release(),
    display_width: display.width,
    display_height: display.height,
  };
}

export function setupSystemInfoRoute(app: Hono, display: DisplaySize): void {
  app.get('/v1/system/info', (c) => c.json(getSystemInfo(display)));
}
