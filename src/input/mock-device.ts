/**
 * Mock Input Device
 *
 * Deterministic in-memory backends. They record every attempted operation
 * and the cursor state, and can be told to fail matching operations. Used by
 * the test suite and by INPUT_BACKEND=mock for running without a display.
 */

import { describeKey } from './keys.js';
import type {
  ButtonDirection,
  Coordinate,
  DisplaySize,
  InputDevice,
  Key,
  MouseButton,
  Point,
  RawFrame,
  ScreenCapture,
} from './types.js';

interface InjectedFailure {
  matches: (operation: string) => boolean;
  message: string;
  remaining: number;
}

export class MockInputDevice implements InputDevice {
  /** Every attempted operation, in order, including ones that failed. */
  readonly operations: string[] = [];
  lastAction = '';

  private position: Point;
  private failures: InjectedFailure[] = [];

  constructor(start: Point = { x: 0, y: 0 }) {
    this.position = { ...start };
  }

  get mousePosition(): Point {
    return { ...this.position };
  }

  /**
   * Make operations whose name satisfies `matches` reject. `times` bounds how
   * many matching calls fail; by default all of them do.
   */
  injectFailure(
    matches: string | ((operation: string) => boolean),
    message = 'mock device failure',
    times = Number.POSITIVE_INFINITY
  ): void {
    const predicate = typeof matches === 'string' ? (op: string) => op.startsWith(matches) : matches;
    this.failures.push({ matches: predicate, message, remaining: times });
  }

  clearFailures(): void {
    this.failures = [];
  }

  async button(button: MouseButton, direction: ButtonDirection): Promise<void> {
    this.record(`button_${button}_${direction}`);
  }

  async moveMouse(x: number, y: number, coordinate: Coordinate): Promise<void> {
    if (coordinate === 'absolute') {
      this.record(`move_mouse_abs_${x},${y}`);
      this.position = { x, y };
    } else {
      this.record(`move_mouse_rel_${x},${y}`);
      this.position = { x: this.position.x + x, y: this.position.y + y };
    }
  }

  async key(key: Key, direction: ButtonDirection): Promise<void> {
    this.record(`key_${describeKey(key)}_${direction}`);
  }

  async text(text: string): Promise<void> {
    this.record(`text_${text}`);
  }

  async location(): Promise<Point> {
    this.check('location');
    return { ...this.position };
  }

  private record(operation: string): void {
    this.operations.push(operation);
    this.check(operation);
    this.lastAction = operation;
  }

  private check(operation: string): void {
    const failure = this.failures.find((f) => f.remaining > 0 && f.matches(operation));
    if (failure) {
      failure.remaining--;
      throw new Error(failure.message);
    }
  }
}

export class MockScreenCapture implements ScreenCapture {
  captureCount = 0;
  private failWith: string | null = null;

  constructor(private readonly size: DisplaySize = { width: 4, height: 3 }) {}

  fail(message: string | null): void {
    this.failWith = message;
  }

  async captureFrame(): Promise<RawFrame> {
    if (this.failWith !== null) {
      throw new Error(this.failWith);
    }
    this.captureCount++;

    const { width, height } = this.size;
    const data = Buffer.alloc(width * height * 4);
    // Horizontal red gradient, opaque, so encoded frames are not uniform
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const offset = (y * width + x) * 4;
        data[offset] = Math.round((x / Math.max(width - 1, 1)) * 255);
        data[offset + 3] = 255;
      }
    }
    return { width, height, data };
  }

  async displaySize(): Promise<DisplaySize> {
    return { ...this.size };
  }
}
