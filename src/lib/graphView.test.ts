import { describe, expect, it } from "vitest";
import type { GraphViewSettingsInput } from "../config/settings";
import { createViewportStore } from "../state/viewportStore";
import type { FrameInput, NodeId, PointerFrame, Vec2 } from "../types/graph";
import { EventChannel } from "./events";
import { Graph } from "./graph";
import { GraphView, type FrameOutput } from "./graphView";
import { PointerTracker } from "./input";

const RECT = { x: 0, y: 0, width: 400, height: 400 };

function frame(pointer: Partial<PointerFrame> = {}, zoomDelta = 1): FrameInput {
  return {
    rect: RECT,
    zoomDelta,
    pointer: {
      position: null,
      pressOrigin: null,
      delta: { x: 0, y: 0 },
      down: false,
      dragStarted: false,
      released: false,
      clicked: false,
      doubleClicked: false,
      ...pointer,
    },
  };
}

function screenOf(output: FrameOutput, id: NodeId): Vec2 {
  const position = output.screenPositions.get(id);
  if (!position) throw new Error(`node ${id} not on screen`);
  return position;
}

function setup(settings: GraphViewSettingsInput = {}) {
  const graph = new Graph<string, string>();
  const a = graph.addNode("A", { location: { x: 0, y: 0 } });
  const b = graph.addNode("B", { location: { x: 100, y: 0 } });
  const c = graph.addNode("C", { location: { x: 50, y: 100 } });
  graph.addEdge(a.id, b.id, "ab");
  graph.addEdge(b.id, c.id, "bc");
  graph.addEdge(c.id, a.id, "ca");

  const channel = new EventChannel();
  const view = new GraphView(graph, { settings, events: channel });
  const viewport = createViewportStore();
  const first = view.update(viewport, frame());

  return { graph, a, b, c, channel, view, viewport, first };
}

const CLICK_AND_SELECT: GraphViewSettingsInput = {
  interaction: { clickingEnabled: true, selectionEnabled: true },
  navigation: { fitToScreenEnabled: false },
};

describe("GraphView first frame", () => {
  it("fits the ring into the canvas without emitting events", () => {
    const { a, b, c, channel, viewport, first } = setup();
    const zoom = viewport.getState().zoom;

    expect(zoom).toBeCloseTo(400 / 130, 10);
    expect(viewport.getState().firstFrame).toBe(false);
    expect(channel.drain()).toEqual([]);

    const left = screenOf(first, a.id).x;
    const right = screenOf(first, b.id).x;
    const top = screenOf(first, a.id).y;
    const bottom = screenOf(first, c.id).y;
    expect((left + right) / 2).toBeCloseTo(200, 10);
    expect((top + bottom) / 2).toBeCloseTo(200, 10);
  });

  it("keeps the initial fit pending until the surface has a size", () => {
    const graph = new Graph<string, string>();
    graph.addNode("A", { location: { x: 0, y: 0 } });
    graph.addNode("B", { location: { x: 100, y: 0 } });
    const view = new GraphView(graph, { settings: { navigation: { fitToScreenEnabled: false } } });
    const viewport = createViewportStore();

    view.update(viewport, { ...frame(), rect: { x: 0, y: 0, width: 0, height: 0 } });
    expect(viewport.getState().firstFrame).toBe(true);
    expect(viewport.getState().zoom).toBe(1);

    view.update(viewport, frame());
    expect(viewport.getState().firstFrame).toBe(false);
    expect(viewport.getState().zoom).not.toBe(1);
  });

  it("strokes edges with the configured default width", () => {
    const { viewport, first } = setup({ style: { edge: { width: 9 } } });
    const zoom = viewport.getState().zoom;
    const body = first.shapes.find((shape) => shape.kind === "line");
    if (body?.kind !== "line") throw new Error("no edge body drawn");

    expect(body.stroke.width).toBeCloseTo(9 * zoom, 10);
  });

  it("draws every element", () => {
    const { first } = setup();
    expect(first.shapes.filter((shape) => shape.kind === "circle")).toHaveLength(3);
    expect(first.requestRepaint).toBe(false);
    expect(first.interaction).toEqual({ kind: "idle" });
  });
});

describe("GraphView clicks", () => {
  it("keeps a single selection", () => {
    const { a, b, channel, view, viewport, first } = setup(CLICK_AND_SELECT);
    channel.drain();

    view.update(viewport, frame({ position: screenOf(first, a.id), clicked: true }));
    expect(channel.drain()).toEqual([
      { type: "NodeClick", id: a.id },
      { type: "NodeSelect", id: a.id },
    ]);

    view.update(viewport, frame({ position: screenOf(first, b.id), clicked: true }));
    expect(channel.drain()).toEqual([
      { type: "NodeClick", id: b.id },
      { type: "NodeDeselect", id: a.id },
      { type: "NodeSelect", id: b.id },
    ]);
    expect(a.selected).toBe(false);
    expect(b.selected).toBe(true);

    view.update(viewport, frame({ position: screenOf(first, b.id), clicked: true }));
    expect(channel.drain()).toEqual([
      { type: "NodeClick", id: b.id },
      { type: "NodeDeselect", id: b.id },
    ]);
  });

  it("clears the selection on a click in empty space", () => {
    const { a, channel, view, viewport, first } = setup(CLICK_AND_SELECT);
    view.update(viewport, frame({ position: screenOf(first, a.id), clicked: true }));
    channel.drain();

    const output = view.update(viewport, frame({ position: { x: 5, y: 5 }, clicked: true }));

    expect(channel.drain()).toEqual([{ type: "NodeDeselect", id: a.id }]);
    expect(output.computed.selectedNodes).toEqual([a.id]);
    expect(a.selected).toBe(false);
  });

  it("adds to the selection in multi mode", () => {
    const { a, b, channel, view, viewport, first } = setup({
      interaction: { selectionMultiEnabled: true },
      navigation: { fitToScreenEnabled: false },
    });

    view.update(viewport, frame({ position: screenOf(first, a.id), clicked: true }));
    view.update(viewport, frame({ position: screenOf(first, b.id), clicked: true }));

    expect(channel.drain()).toEqual([
      { type: "NodeSelect", id: a.id },
      { type: "NodeSelect", id: b.id },
    ]);
    expect([a.selected, b.selected]).toEqual([true, true]);
  });

  it("reports the second click of a pair only as a double click", () => {
    const { a, channel, view, viewport, first } = setup(CLICK_AND_SELECT);
    const tracker = new PointerTracker();
    const position = screenOf(first, a.id);

    tracker.pointerDown(position);
    tracker.pointerUp(position, 0);
    view.update(viewport, tracker.takeFrame(RECT));
    tracker.pointerDown(position);
    tracker.pointerUp(position, 100);
    view.update(viewport, tracker.takeFrame(RECT));

    expect(channel.drain()).toEqual([
      { type: "NodeClick", id: a.id },
      { type: "NodeSelect", id: a.id },
      { type: "NodeDoubleClick", id: a.id },
    ]);
    expect(a.selected).toBe(true);
  });

  it("still handles clicks on frames that refit the view", () => {
    const { a, channel, view, viewport, first } = setup({
      interaction: { clickingEnabled: true },
    });

    view.update(viewport, frame({ position: screenOf(first, a.id), clicked: true }));
    expect(channel.drain()).toEqual([{ type: "NodeClick", id: a.id }]);
  });
});

describe("GraphView dragging", () => {
  const DRAG: GraphViewSettingsInput = {
    interaction: { draggingEnabled: true },
    navigation: { fitToScreenEnabled: false },
  };

  it("moves the grabbed node by the pointer delta in canvas units", () => {
    const { a, channel, view, viewport, first } = setup(DRAG);
    const zoom = viewport.getState().zoom;
    const origin = screenOf(first, a.id);

    const dragging = view.update(
      viewport,
      frame({
        pressOrigin: origin,
        position: { x: origin.x + 30, y: origin.y },
        delta: { x: 30, y: 0 },
        down: true,
        dragStarted: true,
      }),
    );

    const events = channel.drain();
    expect(events[0]).toEqual({ type: "NodeDragStart", id: a.id });
    const move = events[1];
    expect(move.type).toBe("NodeMove");
    if (move.type === "NodeMove") {
      expect(move.id).toBe(a.id);
      expect(move.delta.x).toBeCloseTo(30 / zoom, 10);
      expect(move.delta.y).toBe(0);
    }
    expect(a.location.x).toBeCloseTo(30 / zoom, 10);
    expect(a.dragged).toBe(true);
    expect(dragging.interaction).toEqual({ kind: "dragging", nodeId: a.id });
    expect(dragging.requestRepaint).toBe(true);

    const released = view.update(viewport, frame({ released: true }));
    expect(channel.drain()).toEqual([{ type: "NodeDragEnd", id: a.id }]);
    expect(a.dragged).toBe(false);
    expect(released.interaction).toEqual({ kind: "idle" });
  });

  it("stops quietly when the dragged node disappears", () => {
    const { graph, a, channel, view, viewport, first } = setup(DRAG);
    const origin = screenOf(first, a.id);
    view.update(viewport, frame({ pressOrigin: origin, position: origin, down: true, dragStarted: true }));
    channel.drain();

    graph.removeNode(a.id);
    const output = view.update(viewport, frame({ delta: { x: 5, y: 5 }, down: true }));

    expect(channel.drain()).toEqual([]);
    expect(output.interaction).toEqual({ kind: "idle" });
  });

  it("pans when the press starts off every node", () => {
    const { channel, view, viewport } = setup({
      interaction: { draggingEnabled: true },
      navigation: { zoomAndPanEnabled: true, fitToScreenEnabled: false },
    });
    const pan = viewport.getState().pan;

    view.update(
      viewport,
      frame({
        pressOrigin: { x: 5, y: 5 },
        position: { x: 15, y: 10 },
        delta: { x: 10, y: 5 },
        down: true,
        dragStarted: true,
      }),
    );

    const newPan = { x: pan.x + 10, y: pan.y + 5 };
    expect(channel.drain()).toEqual([{ type: "Pan", delta: { x: 10, y: 5 }, newPan }]);
    expect(viewport.getState().pan).toEqual(newPan);
  });

  it("ignores drags while fit-to-screen holds the view", () => {
    const { a, channel, view, viewport, first } = setup({
      interaction: { draggingEnabled: true },
      navigation: { zoomAndPanEnabled: true },
    });
    const origin = screenOf(first, a.id);

    view.update(
      viewport,
      frame({
        pressOrigin: origin,
        position: { x: origin.x + 30, y: origin.y },
        delta: { x: 30, y: 0 },
        down: true,
        dragStarted: true,
      }),
    );

    expect(channel.drain()).toEqual([]);
    expect(a.location).toEqual({ x: 0, y: 0 });
    expect(a.dragged).toBe(false);
  });

  it("ignores drags when dragging and panning are off", () => {
    const { a, channel, view, viewport, first } = setup({
      navigation: { fitToScreenEnabled: false },
    });
    const origin = screenOf(first, a.id);
    const pan = viewport.getState().pan;

    view.update(
      viewport,
      frame({ pressOrigin: origin, position: origin, delta: { x: 8, y: 8 }, down: true, dragStarted: true }),
    );

    expect(channel.drain()).toEqual([]);
    expect(a.location).toEqual({ x: 0, y: 0 });
    expect(viewport.getState().pan).toEqual(pan);
  });
});

describe("GraphView zoom", () => {
  it("steps the zoom by the configured speed", () => {
    const { channel, view, viewport } = setup({
      navigation: { zoomAndPanEnabled: true, fitToScreenEnabled: false },
    });
    const zoom = viewport.getState().zoom;

    view.update(viewport, frame({}, 1.1));

    const events = channel.drain();
    expect(events).toHaveLength(1);
    const event = events[0];
    expect(event.type).toBe("Zoom");
    if (event.type === "Zoom") expect(event.delta).toBeCloseTo(zoom * 0.1, 10);
    expect(viewport.getState().zoom).toBeCloseTo(zoom * 1.1, 10);
  });

  it("zooms out for a shrinking gesture and keeps the center fixed", () => {
    const { a, b, view, viewport } = setup({
      navigation: { zoomAndPanEnabled: true, fitToScreenEnabled: false },
    });
    const zoom = viewport.getState().zoom;

    const output = view.update(viewport, frame({}, 0.8));

    expect(viewport.getState().zoom).toBeCloseTo(zoom * 0.9, 10);
    const middle = (screenOf(output, a.id).x + screenOf(output, b.id).x) / 2;
    expect(middle).toBeCloseTo(200, 10);
  });

  it("does nothing when navigation is off", () => {
    const { channel, view, viewport } = setup({
      navigation: { fitToScreenEnabled: false },
    });
    const zoom = viewport.getState().zoom;

    view.update(viewport, frame({}, 1.1));

    expect(channel.drain()).toEqual([]);
    expect(viewport.getState().zoom).toBe(zoom);
  });
});

describe("GraphView layout", () => {
  it("keeps repainting while the force layout runs", () => {
    const graph = new Graph<string, string>();
    const a = graph.addNode("A", { location: { x: 0, y: 0 } });
    const b = graph.addNode("B", { location: { x: 10, y: 0 } });
    graph.addEdge(a.id, b.id, "ab");
    const view = new GraphView(graph, { layout: "force" });

    const output = view.update(createViewportStore(), frame());

    expect(view.layout.mode).toBe("force");
    expect(output.requestRepaint).toBe(true);
  });
});
