/**
 * Input Device Types
 *
 * Capability contracts the action queue drives. The queue never talks to a
 * concrete backend; it receives one InputDevice and one ScreenCapture at
 * construction and owns them for its lifetime.
 */

// ============================================
// Pointer
// ============================================

export type MouseButton = 'left' | 'right' | 'middle';

export type ButtonDirection = 'press' | 'release';

/** `absolute` moves to (x, y); `relative` moves by (x, y). */
export type Coordinate = 'absolute' | 'relative';

export interface Point {
  x: number;
  y: number;
}

// ============================================
// Keyboard
// ============================================

export type ModifierKey = 'Control' | 'Alt' | 'Shift' | 'Meta';

export type NamedKey =
  | ModifierKey
  | 'Escape'
  | 'Return'
  | 'Tab'
  | 'Space'
  | 'Backspace'
  | 'UpArrow'
  | 'DownArrow'
  | 'LeftArrow'
  | 'RightArrow'
  | 'Delete'
  | 'Insert'
  | 'Home'
  | 'End'
  | 'PageUp'
  | 'PageDown'
  | 'PrintScreen'
  | 'Pause'
  | 'NumLock'
  | 'CapsLock'
  | 'F1'
  | 'F2'
  | 'F3'
  | 'F4'
  | 'F5'
  | 'F6'
  | 'F7'
  | 'F8'
  | 'F9'
  | 'F10'
  | 'F11'
  | 'F12';

/** A key is either a named key or a single Unicode character. */
export type Key = { kind: 'named'; name: NamedKey } | { kind: 'char'; char: string };

export interface KeyCombo {
  modifiers: ModifierKey[];
  key: Key;
}

// ============================================
// Capability interfaces
// ============================================

/**
 * Pointer and keyboard injection. Every method rejects when the underlying
 * backend fails; nothing is retried.
 */
export interface InputDevice {
  button(button: MouseButton, direction: ButtonDirection): Promise<void>;
  moveMouse(x: number, y: number, coordinate: Coordinate): Promise<void>;
  key(key: Key, direction: ButtonDirection): Promise<void>;
  text(text: string): Promise<void>;
  location(): Promise<Point>;
}

/** One captured frame as tightly packed 8-bit RGBA pixels. */
export interface RawFrame {
  width: number;
  height: number;
  data: Buffer;
}

export interface DisplaySize {
  width: number;
  height: number;
}

export interface ScreenCapture {
  /** Capture one frame of the primary display. */
  captureFrame(): Promise<RawFrame>;
  displaySize(): Promise<DisplaySize>;
}
