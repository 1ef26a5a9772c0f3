import { createStore, type StoreApi } from "zustand/vanilla";
import type { Bounds, Rect, Vec2, ViewportState } from "../types/graph";
import { fitToScreen, rectCenter, zoomAt, type Transform } from "../lib/viewport";

type ViewportActions = {
  setRect: (rect: Rect) => void;
  setPan: (pan: Vec2) => void;
  panBy: (delta: Vec2) => void;
  // Returns the applied zoom difference, 0 when the step was rejected.
  zoomAt: (delta: number, anchor: Vec2 | null) => number;
  // False when the surface has no area yet and nothing was applied.
  fitToScreen: (bounds: Bounds, padding: number) => boolean;
  markFirstFrameDone: () => void;
  reset: () => void;
};

export type ViewportStoreState = ViewportState & ViewportActions;

export type ViewportStore = StoreApi<ViewportStoreState>;

export function defaultViewportState(): ViewportState {
  return {
    zoom: 1,
    pan: { x: 0, y: 0 },
    rect: { x: 0, y: 0, width: 0, height: 0 },
    firstFrame: true,
  };
}

export function getTransform(state: ViewportState): Transform {
  return { zoom: state.zoom, pan: state.pan };
}

/**
 * Creates the viewport session of one hosting surface. The store is passed
 * explicitly into every frame update and survives between frames.
 */
export function createViewportStore(
  initial: Partial<ViewportState> = {},
): ViewportStore {
  return createStore<ViewportStoreState>((set, get) => ({
    ...defaultViewportState(),
    ...initial,

    setRect(rect) {
      set(() => ({ rect }));
    },

    setPan(pan) {
      set(() => ({ pan }));
    },

    panBy(delta) {
      set((state) => ({
        pan: { x: state.pan.x + delta.x, y: state.pan.y + delta.y },
      }));
    },

    zoomAt(delta, anchor) {
      const state = get();
      const next = zoomAt(
        getTransform(state),
        delta,
        anchor ?? rectCenter(state.rect),
      );
      if (!next) return 0;

      set(() => ({ zoom: next.zoom, pan: next.pan }));
      return next.zoom - state.zoom;
    },

    fitToScreen(bounds, padding) {
      const next = fitToScreen(bounds, get().rect, padding);
      if (!next) return false;
      set(() => ({ zoom: next.zoom, pan: next.pan }));
      return true;
    },

    markFirstFrameDone() {
      set(() => ({ firstFrame: false }));
    },

    reset() {
      set(() => defaultViewportState());
    },
  }));
}
