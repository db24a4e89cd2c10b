/**
 * Test Utilities
 *
 * Helper functions and patterns used across multiple test files.
 */

import { PNG } from 'pngjs';

/**
 * Poll `condition` until it holds or `timeoutMs` passes.
 */
export async function waitFor(condition: () => boolean, timeoutMs = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 2));
  }
}

/**
 * Decode a base64 PNG into its dimensions and RGBA pixels.
 */
export function decodePng(base64: string): { width: number; height: number; data: Buffer } {
  const png = PNG.sync.read(Buffer.from(base64, 'base64'));
  return { width: png.width, height: png.height, data: png.data };
}
