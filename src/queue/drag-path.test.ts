import { describe, it, expect } from 'vitest';
import { planDragPath } from './drag-path.js';

describe('planDragPath', () => {
  it('takes one step per 10px of distance', () => {
    const path = planDragPath({ x: 0, y: 0 }, { x: 100, y: 0 });
    expect(path.length).toBe(10);
    expect(path.step).toEqual({ dx: 10, dy: 0 });
    expect([...path].every((v) => v.dx === 10 && v.dy === 0)).toBe(true);
  });

  it('plans a single zero step for a zero-length drag', () => {
    expect([...planDragPath({ x: 42, y: 42 }, { x: 42, y: 42 })]).toEqual([{ dx: 0, dy: 0 }]);
  });

  it('rounds the step count up', () => {
    // distance ~16.55 -> 2 steps of (7.5, 3.5), truncated
    expect([...planDragPath({ x: 0, y: 0 }, { x: 15, y: 7 })]).toEqual([
      { dx: 7, dy: 3 },
      { dx: 7, dy: 3 },
    ]);
  });

  it('truncates negative steps toward zero', () => {
    // distance 25 -> 3 steps of (-6.67, -5)
    expect([...planDragPath({ x: 20, y: 20 }, { x: 0, y: 5 })]).toEqual([
      { dx: -6, dy: -5 },
      { dx: -6, dy: -5 },
      { dx: -6, dy: -5 },
    ]);
  });

  it('normalizes negative zero', () => {
    // distance ~30.02 -> 4 steps of (7.5, -0.25)
    const path = planDragPath({ x: 0, y: 0 }, { x: 30, y: -1 });
    expect(path.length).toBe(4);
    expect(path.step.dx).toBe(7);
    expect(Object.is(path.step.dy, 0)).toBe(true);
  });

  it('plans very long drags without materializing the steps', () => {
    const path = planDragPath({ x: 0, y: 0 }, { x: 4_000_000_000, y: 0 });

    expect(path.length).toBe(400_000_000);
    expect(path.step).toEqual({ dx: 10, dy: 0 });

    const iterator = path[Symbol.iterator]();
    expect(iterator.next()).toEqual({ done: false, value: { dx: 10, dy: 0 } });
  });

  it('hands out independent step objects', () => {
    const [first, second] = planDragPath({ x: 0, y: 0 }, { x: 20, y: 0 });
    first.dx = 99;
    expect(second).toEqual({ dx: 10, dy: 0 });
  });
});
