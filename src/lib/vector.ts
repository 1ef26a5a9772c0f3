import type { Vec2 } from "../types/graph";

export const ZERO: Vec2 = { x: 0, y: 0 };

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(a: Vec2, factor: number): Vec2 {
  return { x: a.x * factor, y: a.y * factor };
}

export function length(a: Vec2): number {
  return Math.hypot(a.x, a.y);
}

export function distance(a: Vec2, b: Vec2): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function midpoint(a: Vec2, b: Vec2): Vec2 {
  return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 };
}

// Returns null for zero-length or non-finite vectors.
export function normalize(a: Vec2): Vec2 | null {
  const len = length(a);
  if (!Number.isFinite(len) || len < 1e-9) return null;
  return { x: a.x / len, y: a.y / len };
}

// Counter-clockwise perpendicular in a y-down screen frame.
export function perpendicular(a: Vec2): Vec2 {
  return { x: -a.y, y: a.x };
}

export function rotate(a: Vec2, angle: number): Vec2 {
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);
  return { x: a.x * cos - a.y * sin, y: a.x * sin + a.y * cos };
}

export function isFiniteVec(a: Vec2): boolean {
  return Number.isFinite(a.x) && Number.isFinite(a.y);
}

export function isZero(a: Vec2): boolean {
  return a.x === 0 && a.y === 0;
}
