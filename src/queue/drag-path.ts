import { DRAG_STEP_PX } from '../constants.js';
import type { Point } from '../input/types.js';

export interface Vector {
  dx: number;
  dy: number;
}

/**
 * A drag plan: `length` equal displacements of `step`, produced on
 * iteration rather than stored.
 */
export interface DragPath extends Iterable<Vector> {
  /** Number of steps, at least one */
  readonly length: number;
  readonly step: Vector;
}

// -0 becomes 0 so zero-length axes compare equal to 0
const truncate = (n: number): number => Math.trunc(n) || 0;

/**
 * Plan a drag from `start` to `end` as a sequence of relative displacements,
 * one per DRAG_STEP_PX of euclidean distance (at least one).
 *
 * Each vector is the proportional step truncated toward zero, so summing
 * them can fall short of `end`. The executor realizes the last vector as an
 * absolute move to `end` instead.
 */
export function planDragPath(start: Point, end: Point): DragPath {
  const dx = end.x - start.x;
  const dy = end.y - start.y;
  const distance = Math.hypot(dx, dy);
  const steps = Math.max(1, Math.ceil(distance / DRAG_STEP_PX));

  const step: Vector = {
    dx: truncate(dx / steps),
    dy: truncate(dy / steps),
  };

  return {
    length: steps,
    step,
    *[Symbol.iterator](): Iterator<Vector> {
      for (let i = 0; i < steps; i++) {
        yield { ...step };
      }
    },
  };
}
