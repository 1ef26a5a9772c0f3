import { POINTER } from "../config/constants";
import type { FrameInput, PointerFrame, Rect, Vec2 } from "../types/graph";
import { add, distance, sub, ZERO } from "./vector";

type LastClick = {
  time: number;
  position: Vec2;
};

export type PointerTrackerOptions = {
  dragThreshold?: number;
  doubleClickMs?: number;
  doubleClickDistance?: number;
  wheelScaleStep?: number;
};

/**
 * Accumulates raw pointer and wheel events between frames and hands them to
 * the view as one `FrameInput` per frame.
 *
 * A press becomes a drag once the pointer travels `dragThreshold` pixels from
 * where it went down; a release that never became a drag is a click, and a
 * second click close in time and space is a double click instead.
 */
export class PointerTracker {
  private readonly dragThreshold: number;
  private readonly doubleClickMs: number;
  private readonly doubleClickDistance: number;
  private readonly wheelScaleStep: number;

  private position: Vec2 | null = null;
  private pressOrigin: Vec2 | null = null;
  private down = false;
  private dragging = false;
  private delta: Vec2 = ZERO;
  private dragStarted = false;
  private released = false;
  private clicked = false;
  private doubleClicked = false;
  private zoomDelta = 1;
  private lastClick: LastClick | null = null;

  constructor(options: PointerTrackerOptions = {}) {
    this.dragThreshold = options.dragThreshold ?? POINTER.dragThreshold;
    this.doubleClickMs = options.doubleClickMs ?? POINTER.doubleClickMs;
    this.doubleClickDistance =
      options.doubleClickDistance ?? POINTER.doubleClickDistance;
    this.wheelScaleStep = options.wheelScaleStep ?? POINTER.wheelScaleStep;
  }

  get isDown(): boolean {
    return this.down;
  }

  pointerDown(position: Vec2): void {
    this.position = position;
    this.pressOrigin = position;
    this.down = true;
    this.dragging = false;
  }

  pointerMove(position: Vec2): void {
    const previous = this.position;
    this.position = position;
    if (!this.down) return;

    if (this.dragging) {
      if (previous) this.delta = add(this.delta, sub(position, previous));
      return;
    }

    const origin = this.pressOrigin;
    if (origin && distance(position, origin) >= this.dragThreshold) {
      this.dragging = true;
      this.dragStarted = true;
      this.delta = add(this.delta, sub(position, origin));
    }
  }

  pointerUp(position: Vec2, time: number): void {
    this.pointerMove(position);
    if (!this.down) return;

    this.down = false;
    this.released = true;
    if (this.dragging) {
      this.dragging = false;
      return;
    }

    const last = this.lastClick;
    if (
      last &&
      time - last.time <= this.doubleClickMs &&
      distance(position, last.position) <= this.doubleClickDistance
    ) {
      this.doubleClicked = true;
      this.lastClick = null;
      return;
    }

    this.clicked = true;
    this.lastClick = { time, position };
  }

  /** Pointer left the surface or the press was cancelled: release, no click. */
  pointerLeave(): void {
    if (this.down) this.released = true;
    this.down = false;
    this.dragging = false;
    this.position = null;
  }

  /** Wheel notch: negative `deltaY` zooms in. */
  wheel(deltaY: number): void {
    if (deltaY === 0 || !Number.isFinite(deltaY)) return;
    this.zoomDelta *= deltaY < 0 ? this.wheelScaleStep : 1 / this.wheelScaleStep;
  }

  /** Snapshot of everything since the previous frame; per-frame flags reset. */
  takeFrame(rect: Rect): FrameInput {
    const pointer: PointerFrame = {
      position: this.position,
      pressOrigin: this.pressOrigin,
      delta: this.delta,
      down: this.down,
      dragStarted: this.dragStarted,
      released: this.released,
      clicked: this.clicked,
      doubleClicked: this.doubleClicked,
    };
    const frame: FrameInput = { rect, pointer, zoomDelta: this.zoomDelta };

    this.delta = ZERO;
    this.dragStarted = false;
    this.released = false;
    this.clicked = false;
    this.doubleClicked = false;
    this.zoomDelta = 1;
    if (!this.down) this.pressOrigin = null;

    return frame;
  }
}

export function idleFrame(rect: Rect): FrameInput {
  return new PointerTracker().takeFrame(rect);
}
