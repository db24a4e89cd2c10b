/**
 * VNC Authentication
 *
 * RFB "VNC Authentication" encrypts the server's 16-byte challenge with DES,
 * keyed by the password with each byte's bits reversed. OpenSSL 3 (Node.js
 * 17+) no longer provides DES, so vnc-rfb-client's own challenge handler
 * fails; patchVncAuth swaps it for one backed by crypto-js.
 */

import CryptoJS from 'crypto-js';

const CHALLENGE_LENGTH = 16;
const KEY_LENGTH = 8;

interface RfbSocketBuffer {
  buffer: Buffer;
  readUInt32BE(): number;
  waitBytes(count: number, message: string): Promise<void>;
}

/**
 * The vnc-rfb-client internals the challenge handler works with.
 */
export interface RfbAuthState {
  _challengeResponseSent: boolean;
  _authenticated: boolean;
  _expectingChallenge: boolean;
  _password: string;
  _socketBuffer: RfbSocketBuffer;
  _log(message: string, debug: boolean, level?: number): void;
  sendData(data: Buffer): void;
  _sendClientInit(): void;
  resetState(): void;
  emit(event: string): unknown;
}

export interface RfbAuthPrototype {
  _handleAuthChallenge(this: RfbAuthState): Promise<void>;
  _patchedForDes?: boolean;
}

function reverseBits(byte: number): number {
  let result = 0;
  for (let i = 0; i < 8; i++) {
    result = (result << 1) | ((byte >> i) & 1);
  }
  return result;
}

/**
 * DES key for a password: first 8 bytes, zero padded, bits reversed.
 */
export function vncAuthKey(password: string): Buffer {
  const raw = Buffer.alloc(KEY_LENGTH);
  // one byte per character
  Buffer.from(password, 'latin1').copy(raw, 0, 0, KEY_LENGTH);

  const key = Buffer.alloc(KEY_LENGTH);
  for (let i = 0; i < KEY_LENGTH; i++) {
    key[i] = reverseBits(raw[i]);
  }
  return key;
}

export function vncAuthResponse(challenge: Buffer, password: string): Buffer {
  if (challenge.length < CHALLENGE_LENGTH) {
    throw new Error(`VNC challenge must be ${CHALLENGE_LENGTH} bytes, got ${challenge.length}`);
  }

  const key = CryptoJS.enc.Hex.parse(vncAuthKey(password).toString('hex'));
  const message = CryptoJS.enc.Hex.parse(challenge.subarray(0, CHALLENGE_LENGTH).toString('hex'));
  const encrypted = CryptoJS.DES.encrypt(message, key, {
    mode: CryptoJS.mode.ECB,
    padding: CryptoJS.pad.NoPadding,
  });
  return Buffer.from(encrypted.ciphertext.toString(CryptoJS.enc.Hex), 'hex');
}

/**
 * Replace the client's challenge handler with one that does not need
 * OpenSSL's DES. Safe to call more than once.
 */
export function patchVncAuth(VncClient: { prototype: RfbAuthPrototype }): void {
  const proto = VncClient.prototype;
  if (proto._patchedForDes) {
    return;
  }

  proto._handleAuthChallenge = async function (this: RfbAuthState): Promise<void> {
    if (this._challengeResponseSent) {
      // Challenge response already sent. Checking result.
      if (this._socketBuffer.readUInt32BE() === 0) {
        this._log('Authenticated successfully', true);
        this._authenticated = true;
        this.emit('authenticated');
        this._expectingChallenge = false;
        this._sendClientInit();
      } else {
        this._log('Authentication failed', true);
        this.emit('authError');
        this.resetState();
      }
      return;
    }

    await this._socketBuffer.waitBytes(CHALLENGE_LENGTH, 'Auth challenge');

    const challenge = this._socketBuffer.buffer.subarray(0, CHALLENGE_LENGTH);
    const response = vncAuthResponse(challenge, this._password || '');
    this._log('Sending challenge response: ' + response.toString('hex'), true, 2);

    this.sendData(response);
    this._challengeResponseSent = true;
  };

  proto._patchedForDes = true;
  console.log('[VncDevice] Patched vnc-rfb-client challenge handler to use crypto-js DES');
}
