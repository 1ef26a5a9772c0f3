import {
  useCallback,
  useEffect,
  useMemo,
  useRef,
  type PointerEvent as ReactPointerEvent,
  type WheelEvent as ReactWheelEvent,
} from "react";
import { useStore } from "zustand";
import type { GraphViewSettingsInput } from "../config/settings";
import type { GraphEvent } from "../lib/events";
import type { Graph } from "../lib/graph";
import { GraphView, type FrameOutput } from "../lib/graphView";
import { PointerTracker } from "../lib/input";
import type { LayoutMode } from "../types/graph";
import type { LayoutProvider } from "../lib/layoutEngine";
import { log } from "../lib/logger";
import { paintShapes } from "../lib/painter";
import { createViewportStore, type ViewportStore } from "../state/viewportStore";

export type UseGraphViewOptions = {
  width: number;
  height: number;
  // Bump after mutating the graph outside of pointer input to repaint.
  revision?: number;
  settings?: GraphViewSettingsInput;
  layout?: LayoutProvider | LayoutMode;
  onEvent?: (event: GraphEvent) => void;
  onFrame?: (output: FrameOutput) => void;
};

function localPoint(event: { clientX: number; clientY: number; currentTarget: Element }) {
  const bounds = event.currentTarget.getBoundingClientRect();
  return { x: event.clientX - bounds.left, y: event.clientY - bounds.top };
}

/**
 * Binds a graph to one canvas: owns the viewport session, the pointer tracker
 * and the animation frame loop. Frames run on demand and keep running while
 * the view asks for a repaint.
 */
export function useGraphView<N, E>(graph: Graph<N, E>, options: UseGraphViewOptions) {
  const { width, height, revision, settings, layout } = options;
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const storeRef = useRef<ViewportStore | null>(null);
  if (!storeRef.current) storeRef.current = createViewportStore();
  const store = storeRef.current;

  const trackerRef = useRef<PointerTracker | null>(null);
  if (!trackerRef.current) trackerRef.current = new PointerTracker();
  const tracker = trackerRef.current;

  const frameRef = useRef<number | null>(null);
  const sizeRef = useRef({ width, height });
  sizeRef.current = { width, height };

  const onEventRef = useRef(options.onEvent);
  onEventRef.current = options.onEvent;
  const onFrameRef = useRef(options.onFrame);
  onFrameRef.current = options.onFrame;

  // Settings are applied in an effect below; the view is rebuilt only when
  // the graph or the layout changes.
  const view = useMemo(
    () =>
      new GraphView(graph, {
        layout,
        events: { send: (event) => onEventRef.current?.(event) },
      }),
    [graph, layout],
  );

  const zoom = useStore(store, (state) => state.zoom);

  const renderFrame = useCallback(() => {
    frameRef.current = null;
    const size = sizeRef.current;
    const input = tracker.takeFrame({
      x: 0,
      y: 0,
      width: size.width,
      height: size.height,
    });
    const output = view.update(store, input);

    const ctx = canvasRef.current?.getContext("2d");
    if (ctx) {
      paintShapes(ctx, output.shapes, size.width, size.height);
    } else {
      log.debug("canvas", "no 2d context, frame not painted");
    }

    onFrameRef.current?.(output);
    if (output.requestRepaint) {
      frameRef.current = requestAnimationFrame(renderFrame);
    }
  }, [store, tracker, view]);

  const requestFrame = useCallback(() => {
    if (frameRef.current !== null) return;
    frameRef.current = requestAnimationFrame(renderFrame);
  }, [renderFrame]);

  const stopFrames = useCallback(() => {
    if (frameRef.current === null) return;
    cancelAnimationFrame(frameRef.current);
    frameRef.current = null;
  }, []);

  useEffect(() => {
    view.configure(settings ?? {});
    requestFrame();
  }, [requestFrame, settings, view]);

  useEffect(() => {
    requestFrame();
  }, [height, requestFrame, revision, width]);

  useEffect(() => {
    return () => {
      stopFrames();
    };
  }, [stopFrames]);

  const onPointerDown = useCallback(
    (event: ReactPointerEvent<HTMLCanvasElement>) => {
      if (event.button !== 0) return;
      event.currentTarget.setPointerCapture(event.pointerId);
      tracker.pointerDown(localPoint(event));
      requestFrame();
    },
    [requestFrame, tracker],
  );

  const onPointerMove = useCallback(
    (event: ReactPointerEvent<HTMLCanvasElement>) => {
      tracker.pointerMove(localPoint(event));
      if (tracker.isDown) requestFrame();
    },
    [requestFrame, tracker],
  );

  const onPointerUp = useCallback(
    (event: ReactPointerEvent<HTMLCanvasElement>) => {
      tracker.pointerUp(localPoint(event), event.timeStamp);
      requestFrame();
    },
    [requestFrame, tracker],
  );

  const onPointerLeave = useCallback(() => {
    tracker.pointerLeave();
    requestFrame();
  }, [requestFrame, tracker]);

  const onWheel = useCallback(
    (event: ReactWheelEvent<HTMLCanvasElement>) => {
      tracker.pointerMove(localPoint(event));
      tracker.wheel(event.deltaY);
      requestFrame();
    },
    [requestFrame, tracker],
  );

  return {
    canvasRef,
    viewport: store,
    zoom,
    view,
    requestFrame,
    handlers: {
      onPointerDown,
      onPointerMove,
      onPointerUp,
      onPointerCancel: onPointerLeave,
      onPointerLeave,
      onWheel,
    },
  };
}
