/**
 * VNC Device
 *
 * Drives a remote desktop over RFB through vnc-rfb-client. One connection
 * backs both capability interfaces: pointer and key events go out as RFB
 * messages, frames come from the client's framebuffer.
 *
 * RFB pointer events are absolute and carry the full button mask, so the
 * device tracks the cursor position and the pressed buttons itself.
 */

import { EventEmitter } from 'events';
import type VncClientType from 'vnc-rfb-client';
import type {
  ButtonDirection,
  Coordinate,
  DisplaySize,
  InputDevice,
  Key,
  MouseButton,
  NamedKey,
  Point,
  RawFrame,
  ScreenCapture,
} from './types.js';
import { patchVncAuth } from './vnc-auth.js';

type VncRfbClient = InstanceType<typeof VncClientType>;
type VncRfbClientModule = typeof VncClientType;

export interface VncDeviceConfig {
  host: string;
  port: number;
  password?: string;
  /** Timeout for the RFB handshake in ms */
  connectTimeout?: number;
}

// X11 keysyms
const NAMED_KEYSYMS: Record<NamedKey, number> = {
  // Modifier keys
  Shift: 0xffe1,
  Control: 0xffe3,
  Alt: 0xffe9,
  Meta: 0xffeb,

  // Function keys
  F1: 0xffbe,
  F2: 0xffbf,
  F3: 0xffc0,
  F4: 0xffc1,
  F5: 0xffc2,
  F6: 0xffc3,
  F7: 0xffc4,
  F8: 0xffc5,
  F9: 0xffc6,
  F10: 0xffc7,
  F11: 0xffc8,
  F12: 0xffc9,

  // Navigation keys
  Escape: 0xff1b,
  Tab: 0xff09,
  Backspace: 0xff08,
  Return: 0xff0d,
  Insert: 0xff63,
  Delete: 0xffff,
  Home: 0xff50,
  End: 0xff57,
  PageUp: 0xff55,
  PageDown: 0xff56,

  // Arrow keys
  UpArrow: 0xff52,
  DownArrow: 0xff54,
  LeftArrow: 0xff51,
  RightArrow: 0xff53,

  // Other keys
  Space: 0x0020,
  CapsLock: 0xffe5,
  NumLock: 0xff7f,
  PrintScreen: 0xff61,
  Pause: 0xff13,
};

const CONTROL_CHAR_KEYSYMS = new Map<string, number>([
  ['\n', NAMED_KEYSYMS.Return],
  ['\r', NAMED_KEYSYMS.Return],
  ['\t', NAMED_KEYSYMS.Tab],
  ['\b', NAMED_KEYSYMS.Backspace],
]);

const SHIFT_SYMBOLS = '~!@#$%^&*()_+{}|:"<>?';

/**
 * Keysym for one character. Printable ASCII and Latin-1 map to themselves;
 * everything else uses the X11 Unicode keysym range.
 */
export function charToKeySym(char: string): number {
  const special = CONTROL_CHAR_KEYSYMS.get(char);
  if (special !== undefined) return special;

  const code = char.codePointAt(0) ?? 0;
  if ((code >= 0x20 && code <= 0x7e) || (code >= 0xa0 && code <= 0xff)) {
    return code;
  }
  return 0x01000000 + code;
}

export function keyToKeySym(key: Key): number {
  return key.kind === 'named' ? NAMED_KEYSYMS[key.name] : charToKeySym(key.char);
}

function needsShift(char: string): boolean {
  if (char >= 'A' && char <= 'Z') return true;
  return SHIFT_SYMBOLS.includes(char);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class VncDevice extends EventEmitter implements InputDevice, ScreenCapture {
  private client: VncRfbClient | null = null;
  private config: VncDeviceConfig;
  private connected = false;
  private width = 0;
  private height = 0;
  private position: Point = { x: 0, y: 0 };
  private pressed: Record<MouseButton, boolean> = { left: false, middle: false, right: false };

  constructor(config: VncDeviceConfig) {
    super();
    this.config = {
      connectTimeout: 30000,
      ...config,
    };
  }

  /**
   * Connect to the VNC server. Resolves once the first framebuffer update
   * arrives, which is when the screen size is known.
   */
  async connect(): Promise<DisplaySize> {
    const tag = '[VncDevice]';
    const timeoutMs = this.config.connectTimeout ?? 30000;
    console.log(`${tag} connect: ${this.config.host}:${this.config.port} (timeout=${timeoutMs}ms)`);

    const rfb = await import('vnc-rfb-client');
    const VncClient: VncRfbClientModule = rfb.default;
    patchVncAuth(VncClient);

    return new Promise((resolve, reject) => {
      let settled = false;
      const settle = (error: Error | null): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        if (error) {
          console.error(`${tag} connect: FAILED - ${error.message}`);
          reject(error);
        } else {
          resolve({ width: this.width, height: this.height });
        }
      };

      const timeoutId = setTimeout(() => {
        settle(new Error(`Connection timeout after ${timeoutMs}ms`));
      }, timeoutMs);

      const client = new VncClient({
        debug: false,
        debugLevel: 0,
        encodings: [
          VncClient.consts.encodings.copyRect,
          VncClient.consts.encodings.zrle,
          VncClient.consts.encodings.hextile,
          VncClient.consts.encodings.raw,
          VncClient.consts.encodings.pseudoDesktopSize,
        ],
      });
      this.client = client;

      client.on('authError', () => {
        settle(new Error('VNC authentication failed - wrong password'));
      });

      client.on('firstFrameUpdate', () => {
        this.connected = true;
        this.width = client.clientWidth;
        this.height = client.clientHeight;
        client.changeFps(5);
        console.log(`${tag} connected: ${this.width}x${this.height}`);
        this.emit('connect');
        settle(null);
      });

      client.on('disconnect', () => {
        console.warn(`${tag} disconnect event`);
        this.connected = false;
        this.emit('disconnect');
      });

      client.on('connectTimeout', () => {
        settle(new Error('VNC connection timeout'));
      });

      client.on('connectError', (error: Error) => {
        settle(error);
      });

      client.connect({
        host: this.config.host,
        port: this.config.port,
        password: this.config.password ?? '',
        set8BitColor: false,
      });
    });
  }

  isConnected(): boolean {
    return this.connected;
  }

  disconnect(): void {
    if (this.client) {
      this.client.disconnect();
      this.client = null;
    }
    this.connected = false;
  }

  // ============================================
  // InputDevice
  // ============================================

  async button(button: MouseButton, direction: ButtonDirection): Promise<void> {
    this.requireClient();
    this.pressed[button] = direction === 'press';
    this.sendPointer();
  }

  async moveMouse(x: number, y: number, coordinate: Coordinate): Promise<void> {
    this.requireClient();
    const target = coordinate === 'absolute' ? { x, y } : { x: this.position.x + x, y: this.position.y + y };
    this.position = this.clamp(target);
    this.sendPointer();
  }

  async key(key: Key, direction: ButtonDirection): Promise<void> {
    this.requireClient().sendKeyEvent(keyToKeySym(key), direction === 'press');
  }

  async text(text: string): Promise<void> {
    const client = this.requireClient();
    const shift = NAMED_KEYSYMS.Shift;

    for (const char of text) {
      const keySym = charToKeySym(char);
      const shifted = needsShift(char);

      if (shifted) {
        client.sendKeyEvent(shift, true);
        await delay(10);
      }

      client.sendKeyEvent(keySym, true);
      await delay(20);
      client.sendKeyEvent(keySym, false);

      if (shifted) {
        await delay(10);
        client.sendKeyEvent(shift, false);
      }

      await delay(30);
    }
  }

  async location(): Promise<Point> {
    this.requireClient();
    return { ...this.position };
  }

  // ============================================
  // ScreenCapture
  // ============================================

  async captureFrame(): Promise<RawFrame> {
    const client = this.requireClient();
    const fb = client.getFb();
    if (!fb || fb.length === 0) {
      throw new Error('No framebuffer available');
    }
    // vnc-rfb-client normalizes the framebuffer to RGBA
    return { width: this.width, height: this.height, data: Buffer.from(fb) };
  }

  async displaySize(): Promise<DisplaySize> {
    this.requireClient();
    return { width: this.width, height: this.height };
  }

  private sendPointer(): void {
    const { x, y } = this.position;
    this.requireClient().sendPointerEvent(
      x, y,
      this.pressed.left,   // button1
      this.pressed.middle, // button2
      this.pressed.right,  // button3
      false, false, false, false, false
    );
  }

  private clamp(point: Point): Point {
    const maxX = this.width > 0 ? this.width - 1 : Number.MAX_SAFE_INTEGER;
    const maxY = this.height > 0 ? this.height - 1 : Number.MAX_SAFE_INTEGER;
    return {
      x: Math.min(Math.max(Math.round(point.x), 0), maxX),
      y: Math.min(Math.max(Math.round(point.y), 0), maxY),
    };
  }

  private requireClient(): VncRfbClient {
    if (!this.connected || !this.client) {
      throw new Error('Not connected to VNC server');
    }
    return this.client;
  }
}
