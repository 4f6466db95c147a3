import { AutomationError } from "../core/errors.js";
import type { Box, BrowserControl, PageElement, Point } from "../core/control.js";
import type { RandomSource } from "../utils/delay.js";
import type { TimingModel } from "./timing.js";

/** Cubic Bézier: start, two randomized control points, end. */
export interface BezierPath {
  start: Point;
  control1: Point;
  control2: Point;
  end: Point;
}

export interface MovementPlan {
  path: BezierPath;
  distance: number;
  speedPxPerSec: number;
  durationMs: number;
  steps: number;
}

export interface PathSample {
  /** Linear progress in [0, 1]. */
  t: number;
  eased: number;
  point: Point;
}

const MIN_SPEED = 800;
const MAX_SPEED = 1200;
const SAMPLE_RATE_HZ = 60;
const MIN_DURATION_SEC = 0.1;
const MIN_STEPS = 10;
const TARGET_AREA = 0.8;
const CONTROL_VARIANCE = 0.2;

/** A point inside the central 80% of the box, so clicks rarely land dead-center. */
export function pickTargetPoint(box: Box, random: RandomSource = Math.random): Point {
  return {
    x: box.x + box.width / 2 + (random() - 0.5) * box.width * TARGET_AREA,
    y: box.y + box.height / 2 + (random() - 0.5) * box.height * TARGET_AREA
  };
}

export function buildBezierPath(start: Point, end: Point, random: RandomSource = Math.random): BezierPath {
  const dx = end.x - start.x;
  const dy = end.y - start.y;
  const variance = Math.hypot(dx, dy) * CONTROL_VARIANCE;
  const offset = (): number => (random() - 0.5) * variance;

  return {
    start,
    control1: { x: start.x + dx * 0.3 + offset(), y: start.y + dy * 0.3 + offset() },
    control2: { x: start.x + dx * 0.7 + offset(), y: start.y + dy * 0.7 + offset() },
    end
  };
}

export function bezierPoint(path: BezierPath, t: number): Point {
  const mt = 1 - t;
  const a = mt * mt * mt;
  const b = 3 * mt * mt * t;
  const c = 3 * mt * t * t;
  const d = t * t * t;
  return {
    x: a * path.start.x + b * path.control1.x + c * path.control2.x + d * path.end.x,
    y: a * path.start.y + b * path.control1.y + c * path.control2.y + d * path.end.y
  };
}

/** Slow start, fast middle, slow finish. */
export function easeInOutCubic(t: number): number {
  return t < 0.5 ? 4 * t * t * t : 1 - Math.pow(-2 * t + 2, 3) / 2;
}

export function stepsFor(distance: number, speedPxPerSec: number): { durationMs: number; steps: number } {
  const durationSec = Math.max(MIN_DURATION_SEC, distance / speedPxPerSec);
  return {
    durationMs: durationSec * 1000,
    steps: Math.max(MIN_STEPS, Math.floor(durationSec * SAMPLE_RATE_HZ))
  };
}

export function planMovement(start: Point, end: Point, random: RandomSource = Math.random): MovementPlan {
  const distance = Math.hypot(end.x - start.x, end.y - start.y);
  const path = buildBezierPath(start, end, random);
  const speedPxPerSec = MIN_SPEED + random() * (MAX_SPEED - MIN_SPEED);
  const { durationMs, steps } = stepsFor(distance, speedPxPerSec);
  return { path, distance, speedPxPerSec, durationMs, steps };
}

/** `steps + 1` samples; the first maps to the start point and the last to the end point. */
export function samplePath(plan: MovementPlan): PathSample[] {
  const samples: PathSample[] = [];
  for (let i = 0; i <= plan.steps; i += 1) {
    const t = i / plan.steps;
    const eased = easeInOutCubic(t);
    samples.push({ t, eased, point: bezierPoint(plan.path, eased) });
  }
  return samples;
}

/**
 * Replays eased Bézier paths as discrete pointer moves. The tracked position
 * is session state: the capability cannot report where the pointer is.
 */
export class PointerSynthesizer {
  private current: Point;

  constructor(
    private readonly control: BrowserControl,
    private readonly timing: TimingModel,
    private readonly random: RandomSource = Math.random,
    start: Point = { x: 0, y: 0 }
  ) {
    this.current = { ...start };
  }

  get position(): Point {
    return { ...this.current };
  }

  /**
   * Moves to a randomized point inside the element. Fails without moving when
   * the element has no bounding box; callers decide on a direct click instead.
   */
  async moveTo(element: PageElement): Promise<Point> {
    const box = await element.boundingBox();
    if (!box) {
      throw new AutomationError("element has no bounding box (detached or not rendered)");
    }
    return this.moveToPoint(pickTargetPoint(box, this.random));
  }

  async moveToPoint(target: Point): Promise<Point> {
    const plan = planMovement(this.current, target, this.random);
    const interval = plan.durationMs / plan.steps;

    let last = this.current;
    for (const sample of samplePath(plan)) {
      await this.control.pointerMove(sample.point.x, sample.point.y);
      last = sample.point;
      await this.timing.pause(interval);
    }

    this.current = { ...last };
    return this.position;
  }
}
