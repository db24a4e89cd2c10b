/**
 * Session Manager
 *
 * Single-tenant gate in front of the action endpoints. At most one session
 * is alive; each successful validation slides its expiration forward.
 */

import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_SESSION_DURATION_MS } from '../constants.js';

export interface Session {
  readonly id: string;
  /** Epoch ms */
  readonly expiresAt: number;
}

export interface SessionConflict {
  conflict: true;
  /** Epoch ms at which the blocking session lapses unless used again */
  expiresAt: number;
}

export interface SessionManagerOptions {
  durationMs?: number;
  /** Clock in epoch ms */
  now?: () => number;
}

export function isSessionConflict(value: Session | SessionConflict): value is SessionConflict {
  return 'conflict' in value;
}

export class SessionManager {
  private session: Session | null = null;
  private readonly durationMs: number;
  private readonly now: () => number;

  constructor(options: SessionManagerOptions = {}) {
    this.durationMs = options.durationMs ?? DEFAULT_SESSION_DURATION_MS;
    this.now = options.now ?? Date.now;
    if (!(this.durationMs > 0)) {
      throw new Error(`Session duration must be positive, got ${this.durationMs}`);
    }
  }

  /**
   * Start a session. A live session blocks this unless `clearExisting` is
   * set, in which case it is replaced.
   */
  createSession(clearExisting = false): Session | SessionConflict {
    const now = this.now();
    const existing = this.session;

    if (existing && existing.expiresAt > now && !clearExisting) {
      console.warn('[Session] Create refused: another session is active');
      return { conflict: true, expiresAt: existing.expiresAt };
    }

    if (existing) {
      console.log(`[Session] Replacing session ${existing.id}${existing.expiresAt > now ? '' : ' (expired)'}`);
    }

    this.session = { id: uuidv4(), expiresAt: now + this.durationMs };
    console.log(`[Session] Created ${this.session.id}`);
    return this.session;
  }

  /**
   * True when `id` names the live session, whose expiration then moves to
   * now + duration. An expired session is evicted.
   */
  validateAndTouch(id: string | null | undefined): boolean {
    const session = this.session;
    if (!session || !id) return false;

    const now = this.now();
    if (session.expiresAt <= now) {
      console.log(`[Session] ${session.id} expired`);
      this.session = null;
      return false;
    }
    if (session.id !== id) return false;

    this.session = { id: session.id, expiresAt: now + this.durationMs };
    return true;
  }

  clear(): void {
    if (this.session) {
      console.log(`[Session] Cleared ${this.session.id}`);
    }
    this.session = null;
  }

  /**
   * The stored session, expired or not. Does not extend it.
   */
  current(): Session | null {
    return this.session;
  }
}
