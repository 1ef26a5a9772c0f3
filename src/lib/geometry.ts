import { GEOMETRY } from "../config/constants";
import type { Vec2 } from "../types/graph";
import {
  add,
  distance,
  isFiniteVec,
  midpoint,
  normalize,
  perpendicular,
  rotate,
  scale,
  sub,
} from "./vector";

export type ArrowTip = {
  point: Vec2;
  left: Vec2;
  right: Vec2;
};

export type EdgeGeometry =
  | { kind: "loop"; from: Vec2; control1: Vec2; control2: Vec2; to: Vec2 }
  | { kind: "line"; from: Vec2; to: Vec2; tip: ArrowTip | null }
  | { kind: "curve"; from: Vec2; control: Vec2; to: Vec2; tip: ArrowTip | null };

// Endpoint of an edge in screen space.
export type EdgeEndpoint = {
  id: number;
  center: Vec2;
  radius: number;
};

export type EdgeGeometryInput = {
  source: EdgeEndpoint;
  target: EdgeEndpoint;
  order: number;
  siblings: number;
  directed: boolean;
  curveSize: number;
  tipSize: number;
  tipAngle: number;
};

export function getCubicPointAt(
  p0: number,
  p1: number,
  p2: number,
  p3: number,
  t: number,
): number {
  const inv = 1 - t;
  return (
    inv * inv * inv * p0 +
    3 * inv * inv * t * p1 +
    3 * inv * t * t * p2 +
    t * t * t * p3
  );
}

export function getQuadraticPointAt(
  p0: number,
  p1: number,
  p2: number,
  t: number,
): number {
  const inv = 1 - t;
  return inv * inv * p0 + 2 * inv * t * p1 + t * t * p2;
}

/**
 * Two wings leaving `tip` against the travel direction `dir`, each rotated
 * by `angle` and `size` long.
 */
export function buildArrowTip(
  tip: Vec2,
  dir: Vec2,
  size: number,
  angle: number,
): ArrowTip {
  const back = scale(dir, -1);
  return {
    point: tip,
    left: add(tip, scale(rotate(back, angle), size)),
    right: add(tip, scale(rotate(back, -angle), size)),
  };
}

export function arrowTipLength(size: number, angle: number): number {
  return size * Math.cos(angle);
}

export function buildSelfLoop(
  center: Vec2,
  radius: number,
  order: number,
): EdgeGeometry {
  const loopSize = radius * (GEOMETRY.loopSizeFactor + order);
  const attachX = radius * Math.cos(GEOMETRY.loopAttachAngle);
  const attachY = radius * Math.sin(GEOMETRY.loopAttachAngle);

  return {
    kind: "loop",
    from: { x: center.x + attachX, y: center.y - attachY },
    control1: { x: center.x + loopSize, y: center.y - loopSize },
    control2: { x: center.x - loopSize, y: center.y - loopSize },
    to: { x: center.x - attachX, y: center.y - attachY },
  };
}

export function buildStraightEdge(
  input: EdgeGeometryInput,
): EdgeGeometry | null {
  const { source, target } = input;
  const dir = normalize(sub(target.center, source.center));
  if (!dir) return null;

  const from = add(source.center, scale(dir, source.radius));
  const tipPoint = sub(target.center, scale(dir, target.radius));

  if (!input.directed) {
    return { kind: "line", from, to: tipPoint, tip: null };
  }

  const tipLength = arrowTipLength(input.tipSize, input.tipAngle);
  return {
    kind: "line",
    from,
    to: sub(tipPoint, scale(dir, tipLength)),
    tip: buildArrowTip(tipPoint, dir, input.tipSize, input.tipAngle),
  };
}

export function buildParallelEdge(
  input: EdgeGeometryInput,
): EdgeGeometry | null {
  const { source, target } = input;
  const dir = normalize(sub(target.center, source.center));
  if (!dir) return null;

  // Bend relative to the lower-id -> higher-id direction so siblings running
  // in opposite directions still fan out on one side.
  const canonical = source.id <= target.id ? dir : scale(dir, -1);
  const rank = input.order + 1;
  const control = add(
    midpoint(source.center, target.center),
    scale(perpendicular(canonical), input.curveSize * rank),
  );

  const from = add(source.center, scale(dir, source.radius));
  const tipPoint = sub(target.center, scale(dir, target.radius));

  if (!input.directed) {
    return { kind: "curve", from, control, to: tipPoint, tip: null };
  }

  const tangent = normalize(sub(tipPoint, control)) ?? dir;
  const tipLength = arrowTipLength(input.tipSize, input.tipAngle);
  return {
    kind: "curve",
    from,
    control,
    to: sub(tipPoint, scale(tangent, tipLength)),
    tip: buildArrowTip(tipPoint, tangent, input.tipSize, input.tipAngle),
  };
}

/**
 * Picks the loop, straight or parallel form for an edge. Returns null when
 * the endpoints are not finite or coincide for distinct nodes.
 */
export function computeEdgeGeometry(
  input: EdgeGeometryInput,
): EdgeGeometry | null {
  const { source, target } = input;
  if (
    !isFiniteVec(source.center) ||
    !isFiniteVec(target.center) ||
    !Number.isFinite(source.radius) ||
    !Number.isFinite(target.radius)
  ) {
    return null;
  }

  if (source.id === target.id) {
    return buildSelfLoop(source.center, source.radius, input.order);
  }

  if (input.siblings > 1) return buildParallelEdge(input);
  return buildStraightEdge(input);
}

export function sampleEdgeGeometry(
  geometry: EdgeGeometry,
  samples: number = GEOMETRY.curveSamples,
): Vec2[] {
  if (geometry.kind === "line") return [geometry.from, geometry.tip?.point ?? geometry.to];

  const points: Vec2[] = [];
  for (let step = 0; step <= samples; step += 1) {
    const t = step / samples;
    if (geometry.kind === "curve") {
      const end = geometry.tip?.point ?? geometry.to;
      points.push({
        x: getQuadraticPointAt(geometry.from.x, geometry.control.x, end.x, t),
        y: getQuadraticPointAt(geometry.from.y, geometry.control.y, end.y, t),
      });
    } else {
      points.push({
        x: getCubicPointAt(
          geometry.from.x,
          geometry.control1.x,
          geometry.control2.x,
          geometry.to.x,
          t,
        ),
        y: getCubicPointAt(
          geometry.from.y,
          geometry.control1.y,
          geometry.control2.y,
          geometry.to.y,
          t,
        ),
      });
    }
  }
  return points;
}

export function distanceToSegment(point: Vec2, a: Vec2, b: Vec2): number {
  const ab = sub(b, a);
  const lengthSquared = ab.x * ab.x + ab.y * ab.y;
  if (lengthSquared === 0) return distance(point, a);

  const t = Math.max(
    0,
    Math.min(1, ((point.x - a.x) * ab.x + (point.y - a.y) * ab.y) / lengthSquared),
  );
  return distance(point, add(a, scale(ab, t)));
}

export function distanceToPolyline(point: Vec2, points: Vec2[]): number {
  let best = Number.POSITIVE_INFINITY;
  for (let index = 1; index < points.length; index += 1) {
    best = Math.min(best, distanceToSegment(point, points[index - 1], points[index]));
  }
  return best;
}
