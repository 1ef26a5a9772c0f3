import { DEFAULT_FIT_DIAGONAL } from "../config/constants";
import type { Bounds, Rect, Vec2 } from "../types/graph";
import { isZero, sub } from "./vector";

export type Transform = {
  zoom: number;
  pan: Vec2;
};

export function screenToCanvas(transform: Transform, point: Vec2): Vec2 {
  return {
    x: (point.x - transform.pan.x) / transform.zoom,
    y: (point.y - transform.pan.y) / transform.zoom,
  };
}

export function canvasToScreen(transform: Transform, point: Vec2): Vec2 {
  return {
    x: point.x * transform.zoom + transform.pan.x,
    y: point.y * transform.zoom + transform.pan.y,
  };
}

export function rectCenter(rect: Rect): Vec2 {
  return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}

/**
 * Scales zoom by `1 + delta` while keeping `anchor` (screen space) over the
 * same canvas point. Returns null when the resulting zoom is not a positive
 * finite number.
 */
export function zoomAt(
  transform: Transform,
  delta: number,
  anchor: Vec2,
): Transform | null {
  const nextZoom = transform.zoom * (1 + delta);
  if (!Number.isFinite(nextZoom) || nextZoom <= 0) return null;

  const graphAnchor = screenToCanvas(transform, anchor);
  return {
    zoom: nextZoom,
    pan: {
      x: anchor.x - graphAnchor.x * nextZoom,
      y: anchor.y - graphAnchor.y * nextZoom,
    },
  };
}

export function fitToScreen(
  bounds: Bounds,
  rect: Rect,
  padding: number,
): Transform | null {
  let diag = sub(bounds.max, bounds.min);
  if (isZero(diag)) diag = DEFAULT_FIT_DIAGONAL;

  const width = diag.x * (1 + padding);
  const height = diag.y * (1 + padding);
  const zoom = Math.min(
    width > 0 ? rect.width / width : Number.POSITIVE_INFINITY,
    height > 0 ? rect.height / height : Number.POSITIVE_INFINITY,
  );
  if (!Number.isFinite(zoom) || zoom <= 0) return null;

  const graphCenter = {
    x: (bounds.min.x + bounds.max.x) / 2,
    y: (bounds.min.y + bounds.max.y) / 2,
  };
  const canvasCenter = rectCenter(rect);

  return {
    zoom,
    pan: {
      x: canvasCenter.x - graphCenter.x * zoom,
      y: canvasCenter.y - graphCenter.y * zoom,
    },
  };
}
