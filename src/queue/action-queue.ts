/**
 * Action Queue
 *
 * Admits action requests from any number of callers and runs them one at a
 * time on the input device. A single background worker takes the most
 * recently submitted entry first (LIFO), holds the device lock for the whole
 * handler sequence, publishes the request/response pair to the monitor and
 * delivers the response on the entry's completion handle.
 *
 * A caller waiting in execute() gives up after its timeout. At that point
 * every pending entry of the same kind is pruned, so a burst of identical
 * requests against a stuck device does not keep piling up.
 */

import { Mutex } from 'async-mutex';
import { v4 as uuidv4 } from 'uuid';
import { ACTION_TIMEOUT_MS } from '../constants.js';
import { channelError, timeoutError, toFailedResult } from '../actions/errors.js';
import { createErrorResponse, responseFromResult } from '../actions/responses.js';
import type { Action, ActionRequest, ActionResponse, ActionResult } from '../actions/types.js';
import type { InputDevice, ScreenCapture } from '../input/types.js';
import { createActionRequestEvent, createActionResponseEvent } from '../monitor/events.js';
import type { MonitorHub } from '../monitor/hub.js';
import { DEFAULT_TIMINGS, handleAction, sleep, type ActionTimings, type HandlerContext } from './handlers.js';

export const PRUNED_MESSAGE = 'Action removed from queue after timeout';
export const STOPPED_MESSAGE = 'Action queue stopped';

export interface ActionCompletion {
  result: ActionResult;
  response: ActionResponse;
}

/**
 * Resolves exactly once, when the worker finishes the entry or the entry is
 * discarded.
 */
export interface CompletionHandle {
  readonly requestId: string;
  readonly completion: Promise<ActionCompletion>;
}

interface QueueEntry {
  request: ActionRequest;
  complete: (completion: ActionCompletion) => void;
}

export interface ActionQueueOptions {
  device: InputDevice;
  capture: ScreenCapture;
  monitor?: MonitorHub;
  timings?: Partial<ActionTimings>;
  /** Default wait in execute() before answering with a timeout */
  timeoutMs?: number;
}

const TIMED_OUT = Symbol('timed-out');

export class ActionQueue {
  private pending: QueueEntry[] = [];
  private admission = new Mutex();
  private deviceLock = new Mutex();
  private context: HandlerContext;
  private monitor: MonitorHub | null;
  private timeoutMs: number;
  private running = false;
  private worker: Promise<void> | null = null;

  constructor(options: ActionQueueOptions) {
    this.context = {
      device: options.device,
      capture: options.capture,
      timings: { ...DEFAULT_TIMINGS, ...options.timings },
    };
    this.monitor = options.monitor ?? null;
    this.timeoutMs = options.timeoutMs ?? ACTION_TIMEOUT_MS;
  }

  /**
   * Append an action to the queue and return without waiting for it to run.
   */
  async submit(action: Action, requestId: string = uuidv4()): Promise<CompletionHandle> {
    const request: ActionRequest = { id: requestId, action };
    let complete: (completion: ActionCompletion) => void = () => {};
    const completion = new Promise<ActionCompletion>((resolve) => {
      complete = resolve;
    });

    await this.admission.runExclusive(() => {
      this.pending.push({ request, complete });
    });

    return { requestId, completion };
  }

  /**
   * Submit a request and wait for its response, or answer with a timeout
   * error once `timeoutMs` elapses.
   */
  async execute(request: ActionRequest, timeoutMs: number = this.timeoutMs): Promise<ActionResponse> {
    const handle = await this.submit(request.action, request.id);

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
    });

    try {
      const outcome = await Promise.race([handle.completion, timeout]);
      if (outcome !== TIMED_OUT) {
        return outcome.response;
      }
    } finally {
      clearTimeout(timer);
    }

    const pruned = await this.prune(request.action.type);
    console.warn(
      `[ActionQueue] ${request.action.type} (${request.id}) timed out after ${timeoutMs}ms; ` +
        `pruned ${pruned} pending ${request.action.type} entr${pruned === 1 ? 'y' : 'ies'}`
    );
    return createErrorResponse(request.id, request.action, timeoutError());
  }

  /**
   * Start the background worker. Calling start on a running queue is a no-op.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.worker = this.runWorker();
    console.log('[ActionQueue] Worker started');
  }

  /**
   * Stop the worker after the entry in progress, then settle everything
   * still pending with a channel error.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await this.worker;
    this.worker = null;

    const abandoned = await this.admission.runExclusive(() => this.pending.splice(0));
    for (const entry of abandoned) {
      this.discard(entry, STOPPED_MESSAGE);
    }
    console.log(`[ActionQueue] Worker stopped (${abandoned.length} pending discarded)`);
  }

  isRunning(): boolean {
    return this.running;
  }

  pendingCount(): number {
    return this.pending.length;
  }

  private async prune(kind: Action['type']): Promise<number> {
    const removed = await this.admission.runExclusive(() => {
      const keep: QueueEntry[] = [];
      const drop: QueueEntry[] = [];
      for (const entry of this.pending) {
        (entry.request.action.type === kind ? drop : keep).push(entry);
      }
      this.pending = keep;
      return drop;
    });

    for (const entry of removed) {
      this.discard(entry, PRUNED_MESSAGE);
    }
    return removed.length;
  }

  private discard(entry: QueueEntry, message: string): void {
    const error = channelError(message);
    entry.complete({
      result: { success: false, error },
      response: createErrorResponse(entry.request.id, entry.request.action, error),
    });
  }

  private async runWorker(): Promise<void> {
    while (this.running) {
      const entry = await this.admission.runExclusive(() => this.pending.pop());
      if (entry) {
        await this.process(entry);
      }
      await sleep(this.context.timings.idleMs);
    }
  }

  private async process(entry: QueueEntry): Promise<void> {
    const { request } = entry;
    const startTime = Date.now();

    const result = await this.deviceLock.runExclusive(async (): Promise<ActionResult> => {
      await sleep(this.context.timings.actionDelayMs);
      try {
        return { success: true, output: await handleAction(this.context, request.action) };
      } catch (error) {
        return toFailedResult(error);
      }
    });

    const response = responseFromResult(request.id, request.action, result);
    const duration = Date.now() - startTime;
    if (result.success) {
      console.log(`[ActionQueue] ${request.action.type} (${request.id}) completed in ${duration}ms`);
    } else {
      console.warn(
        `[ActionQueue] ${request.action.type} (${request.id}) failed in ${duration}ms: ` +
          `${result.error.type}: ${result.error.message}`
      );
    }

    this.monitor?.publish(createActionRequestEvent(request));
    this.monitor?.publish(createActionResponseEvent(response));
    entry.complete({ result, response });
  }
}
