import { describe, expect, it } from "vitest";
import { idleFrame, PointerTracker } from "./input";

const RECT = { x: 0, y: 0, width: 100, height: 100 };

describe("PointerTracker", () => {
  it("starts a drag once the pointer clears the threshold", () => {
    const tracker = new PointerTracker();
    tracker.pointerDown({ x: 0, y: 0 });
    tracker.pointerMove({ x: 2, y: 0 });

    const before = tracker.takeFrame(RECT).pointer;
    expect(before.dragStarted).toBe(false);
    expect(before.delta).toEqual({ x: 0, y: 0 });

    tracker.pointerMove({ x: 3, y: 0 });
    const started = tracker.takeFrame(RECT).pointer;
    expect(started.dragStarted).toBe(true);
    expect(started.pressOrigin).toEqual({ x: 0, y: 0 });
    expect(started.delta).toEqual({ x: 3, y: 0 });
    expect(started.down).toBe(true);

    tracker.pointerMove({ x: 5, y: 1 });
    tracker.pointerMove({ x: 6, y: 3 });
    const moving = tracker.takeFrame(RECT).pointer;
    expect(moving.dragStarted).toBe(false);
    expect(moving.delta).toEqual({ x: 3, y: 3 });
  });

  it("turns a release without a drag into a click", () => {
    const tracker = new PointerTracker();
    tracker.pointerDown({ x: 10, y: 10 });
    tracker.pointerUp({ x: 10, y: 10 }, 0);

    const pointer = tracker.takeFrame(RECT).pointer;
    expect(pointer.clicked).toBe(true);
    expect(pointer.released).toBe(true);
    expect(pointer.doubleClicked).toBe(false);
    expect(pointer.position).toEqual({ x: 10, y: 10 });
  });

  it("recognizes a double click close in time and space", () => {
    const tracker = new PointerTracker();
    tracker.pointerDown({ x: 10, y: 10 });
    tracker.pointerUp({ x: 10, y: 10 }, 0);
    tracker.takeFrame(RECT);

    tracker.pointerDown({ x: 12, y: 10 });
    tracker.pointerUp({ x: 12, y: 10 }, 200);
    const second = tracker.takeFrame(RECT).pointer;
    expect(second.doubleClicked).toBe(true);
    expect(second.clicked).toBe(false);

    tracker.pointerDown({ x: 12, y: 10 });
    tracker.pointerUp({ x: 12, y: 10 }, 300);
    expect(tracker.takeFrame(RECT).pointer.clicked).toBe(true);
  });

  it("keeps slow clicks apart", () => {
    const tracker = new PointerTracker();
    tracker.pointerDown({ x: 10, y: 10 });
    tracker.pointerUp({ x: 10, y: 10 }, 0);
    tracker.takeFrame(RECT);

    tracker.pointerDown({ x: 10, y: 10 });
    tracker.pointerUp({ x: 10, y: 10 }, 301);
    const pointer = tracker.takeFrame(RECT).pointer;
    expect(pointer.clicked).toBe(true);
    expect(pointer.doubleClicked).toBe(false);
  });

  it("releases a drag without clicking", () => {
    const tracker = new PointerTracker();
    tracker.pointerDown({ x: 0, y: 0 });
    tracker.pointerMove({ x: 10, y: 0 });
    tracker.takeFrame(RECT);
    tracker.pointerUp({ x: 12, y: 0 }, 50);

    const pointer = tracker.takeFrame(RECT).pointer;
    expect(pointer.released).toBe(true);
    expect(pointer.clicked).toBe(false);
    expect(pointer.delta).toEqual({ x: 2, y: 0 });
    expect(pointer.pressOrigin).toEqual({ x: 0, y: 0 });
    expect(tracker.takeFrame(RECT).pointer.pressOrigin).toBeNull();
  });

  it("cancels a press when the pointer leaves", () => {
    const tracker = new PointerTracker();
    tracker.pointerDown({ x: 0, y: 0 });
    tracker.pointerLeave();

    const pointer = tracker.takeFrame(RECT).pointer;
    expect(pointer.released).toBe(true);
    expect(pointer.clicked).toBe(false);
    expect(pointer.position).toBeNull();
  });

  it("folds wheel notches into one scale factor", () => {
    const tracker = new PointerTracker();
    tracker.wheel(-100);
    expect(tracker.takeFrame(RECT).zoomDelta).toBeCloseTo(1.1, 10);

    tracker.wheel(100);
    tracker.wheel(100);
    expect(tracker.takeFrame(RECT).zoomDelta).toBeCloseTo(1 / 1.21, 10);
    expect(tracker.takeFrame(RECT).zoomDelta).toBe(1);
  });

  it("builds an idle frame", () => {
    const frame = idleFrame(RECT);
    expect(frame.rect).toBe(RECT);
    expect(frame.zoomDelta).toBe(1);
    expect(frame.pointer.position).toBeNull();
    expect(frame.pointer.clicked).toBe(false);
  });
});
