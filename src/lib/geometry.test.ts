import { describe, expect, it } from "vitest";
import {
  computeEdgeGeometry,
  distanceToSegment,
  type EdgeEndpoint,
  type EdgeGeometryInput,
} from "./geometry";

const source: EdgeEndpoint = { id: 0, center: { x: 0, y: 0 }, radius: 5 };
const target: EdgeEndpoint = { id: 1, center: { x: 100, y: 0 }, radius: 5 };

function input(overrides: Partial<EdgeGeometryInput> = {}): EdgeGeometryInput {
  return {
    source,
    target,
    order: 0,
    siblings: 1,
    directed: true,
    curveSize: 20,
    tipSize: 15,
    tipAngle: Math.PI / 6,
    ...overrides,
  };
}

describe("computeEdgeGeometry", () => {
  it("draws a single edge straight, stopping short of the arrow tip", () => {
    const geometry = computeEdgeGeometry(input());

    expect(geometry?.kind).toBe("line");
    if (geometry?.kind !== "line") return;
    expect(geometry.from).toEqual({ x: 5, y: 0 });
    expect(geometry.to.x).toBeCloseTo(82.0096, 4);
    expect(geometry.to.y).toBeCloseTo(0, 10);
    expect(geometry.tip?.point).toEqual({ x: 95, y: 0 });
    expect(geometry.tip?.left.x).toBeCloseTo(82.0096, 4);
    expect(geometry.tip?.left.y).toBeCloseTo(-7.5, 10);
    expect(geometry.tip?.right.x).toBeCloseTo(82.0096, 4);
    expect(geometry.tip?.right.y).toBeCloseTo(7.5, 10);
  });

  it("runs an undirected edge boundary to boundary without a tip", () => {
    const geometry = computeEdgeGeometry(input({ directed: false }));

    expect(geometry).toEqual({
      kind: "line",
      from: { x: 5, y: 0 },
      to: { x: 95, y: 0 },
      tip: null,
    });
  });

  it("bends parallel edges further with each order index", () => {
    const first = computeEdgeGeometry(input({ siblings: 2, order: 0 }));
    const second = computeEdgeGeometry(input({ siblings: 2, order: 1 }));

    expect(first?.kind).toBe("curve");
    if (first?.kind !== "curve" || second?.kind !== "curve") return;
    expect(first.control.x).toBeCloseTo(50, 10);
    expect(first.control.y).toBeCloseTo(20, 10);
    expect(second.control.x).toBeCloseTo(50, 10);
    expect(second.control.y).toBeCloseTo(40, 10);
    expect(first.tip?.point).toEqual({ x: 95, y: 0 });
  });

  it("bends opposite-direction siblings to the same side", () => {
    const reverse = computeEdgeGeometry(
      input({ source: target, target: source, siblings: 2, order: 0 }),
    );

    expect(reverse?.kind).toBe("curve");
    if (reverse?.kind !== "curve") return;
    expect(reverse.control.x).toBeCloseTo(50, 10);
    expect(reverse.control.y).toBeCloseTo(20, 10);
    expect(reverse.tip?.point).toEqual({ x: 5, y: 0 });
  });

  it("loops above the node, larger for higher orders", () => {
    const node: EdgeEndpoint = { id: 3, center: { x: 0, y: 0 }, radius: 10 };
    const loop = computeEdgeGeometry(input({ source: node, target: node }));
    const outer = computeEdgeGeometry(input({ source: node, target: node, order: 1 }));

    expect(loop?.kind).toBe("loop");
    if (loop?.kind !== "loop" || outer?.kind !== "loop") return;
    const attach = 10 * Math.SQRT1_2;
    expect(loop.from.x).toBeCloseTo(attach, 10);
    expect(loop.from.y).toBeCloseTo(-attach, 10);
    expect(loop.to.x).toBeCloseTo(-attach, 10);
    expect(loop.control1).toEqual({ x: 40, y: -40 });
    expect(loop.control2).toEqual({ x: -40, y: -40 });
    expect(outer.control1).toEqual({ x: 50, y: -50 });
  });

  it("gives nothing for coincident or non-finite endpoints", () => {
    const stacked: EdgeEndpoint = { id: 1, center: { x: 0, y: 0 }, radius: 5 };
    const broken: EdgeEndpoint = { id: 1, center: { x: Number.NaN, y: 0 }, radius: 5 };

    expect(computeEdgeGeometry(input({ target: stacked }))).toBeNull();
    expect(computeEdgeGeometry(input({ target: broken }))).toBeNull();
  });
});

describe("distanceToSegment", () => {
  it("clamps to the segment ends", () => {
    const a = { x: 0, y: 0 };
    const b = { x: 10, y: 0 };

    expect(distanceToSegment({ x: 5, y: 3 }, a, b)).toBe(3);
    expect(distanceToSegment({ x: 13, y: 4 }, a, b)).toBe(5);
  });
});
