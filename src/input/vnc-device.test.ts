import { describe, it, expect } from 'vitest';
import { charToKeySym, keyToKeySym, VncDevice } from './vnc-device.js';
import { TEST_PASSWORD } from '../test-helpers/index.js';

describe('charToKeySym', () => {
  it('maps printable ASCII to itself', () => {
    expect(charToKeySym('a')).toBe(0x61);
    expect(charToKeySym('A')).toBe(0x41);
    expect(charToKeySym(' ')).toBe(0x20);
    expect(charToKeySym('~')).toBe(0x7e);
  });

  it('maps control characters to their function keys', () => {
    expect(charToKeySym('\n')).toBe(0xff0d);
    expect(charToKeySym('\t')).toBe(0xff09);
    expect(charToKeySym('\b')).toBe(0xff08);
  });

  it('maps Latin-1 to itself', () => {
    expect(charToKeySym('é')).toBe(0xe9);
  });

  it('uses the Unicode keysym range beyond Latin-1', () => {
    expect(charToKeySym('€')).toBe(0x010020ac);
    expect(charToKeySym('😊')).toBe(0x0101f60a);
  });
});

describe('keyToKeySym', () => {
  it('looks up named keys', () => {
    expect(keyToKeySym({ kind: 'named', name: 'Return' })).toBe(0xff0d);
    expect(keyToKeySym({ kind: 'named', name: 'Control' })).toBe(0xffe3);
    expect(keyToKeySym({ kind: 'named', name: 'F12' })).toBe(0xffc9);
  });

  it('maps character keys through charToKeySym', () => {
    expect(keyToKeySym({ kind: 'char', char: 'z' })).toBe(0x7a);
  });
});

describe('VncDevice', () => {
  const device = new VncDevice({ host: '127.0.0.1', port: 5900, password: TEST_PASSWORD });

  it('starts disconnected', () => {
    expect(device.isConnected()).toBe(false);
  });

  it('rejects input before connecting', async () => {
    await expect(device.button('left', 'press')).rejects.toThrow('Not connected to VNC server');
    await expect(device.moveMouse(1, 1, 'absolute')).rejects.toThrow('Not connected to VNC server');
    await expect(device.location()).rejects.toThrow('Not connected to VNC server');
    await expect(device.captureFrame()).rejects.toThrow('Not connected to VNC server');
  });
});
