import { GEOMETRY } from "../config/constants";
import type { StyleSettings } from "../config/settings";
import type { EdgeStyle, Shape, Vec2 } from "../types/graph";
import {
  computeEdgeGeometry,
  distanceToPolyline,
  sampleEdgeGeometry,
  type EdgeEndpoint,
  type EdgeGeometry,
} from "./geometry";
import {
  getEdgeColor,
  getNodeColors,
  LABEL_COLOR,
  shouldShowLabel,
} from "./graphVisuals";
import { canvasToScreen, type Transform } from "./viewport";
import { distance } from "./vector";

export type DrawContext = {
  transform: Transform;
  style: StyleSettings;
  directed: boolean;
};

export type NodeProps = {
  id: number;
  location: Vec2;
  label: string;
  // Canvas-space radius, connection weight included.
  radius: number;
  selected: boolean;
  dragged: boolean;
};

export type EdgeProps = {
  id: number;
  source: number;
  target: number;
  order: number;
  siblings: number;
  style: Partial<EdgeStyle>;
  selected: boolean;
};

/**
 * Rendering and hit-testing strategy of a node. The graph keeps one instance
 * per node and refreshes it once per frame.
 */
export interface DisplayNode {
  update(props: NodeProps): void;
  isInside(canvasPoint: Vec2): boolean;
  shapes(ctx: DrawContext): Shape[];
}

export interface DisplayEdge {
  update(props: EdgeProps): void;
  isInside(source: EdgeEndpoint, target: EdgeEndpoint, screenPoint: Vec2, ctx: DrawContext): boolean;
  shapes(source: EdgeEndpoint, target: EdgeEndpoint, ctx: DrawContext): Shape[];
}

export type NodeDisplayFactory = (props: NodeProps) => DisplayNode;
export type EdgeDisplayFactory = (props: EdgeProps) => DisplayEdge;

export class DefaultNodeShape implements DisplayNode {
  private props: NodeProps;

  constructor(props: NodeProps) {
    this.props = props;
  }

  update(props: NodeProps): void {
    this.props = props;
  }

  // Boundary inclusive.
  isInside(canvasPoint: Vec2): boolean {
    return distance(this.props.location, canvasPoint) <= this.props.radius;
  }

  shapes(ctx: DrawContext): Shape[] {
    const { location, radius, label } = this.props;
    const center = canvasToScreen(ctx.transform, location);
    const screenRadius = radius * ctx.transform.zoom;
    const colors = getNodeColors(this.props);

    const shapes: Shape[] = [
      {
        kind: "circle",
        center,
        radius: screenRadius,
        fill: colors.fill,
        stroke: { width: 1, color: colors.stroke },
      },
    ];

    if (label && shouldShowLabel(this.props, ctx.style.labelsAlways)) {
      shapes.push({
        kind: "text",
        position: { x: center.x, y: center.y - screenRadius * 2 },
        text: label,
        size: GEOMETRY.labelSize,
        color: LABEL_COLOR,
      });
    }

    return shapes;
  }
}

export class DefaultEdgeShape implements DisplayEdge {
  private props: EdgeProps;

  constructor(props: EdgeProps) {
    this.props = props;
  }

  update(props: EdgeProps): void {
    this.props = props;
  }

  private style(ctx: DrawContext): EdgeStyle {
    const own = this.props.style;
    const base = ctx.style.edge;
    return {
      width: own.width ?? base.width,
      curveSize: own.curveSize ?? base.curveSize,
      tipSize: own.tipSize ?? base.tipSize,
      tipAngle: own.tipAngle ?? base.tipAngle,
    };
  }

  private geometry(
    source: EdgeEndpoint,
    target: EdgeEndpoint,
    ctx: DrawContext,
  ): EdgeGeometry | null {
    const { order, siblings } = this.props;
    const style = this.style(ctx);
    return computeEdgeGeometry({
      source,
      target,
      order,
      siblings,
      directed: ctx.directed,
      curveSize: style.curveSize * ctx.transform.zoom,
      tipSize: style.tipSize * ctx.transform.zoom,
      tipAngle: style.tipAngle,
    });
  }

  isInside(
    source: EdgeEndpoint,
    target: EdgeEndpoint,
    screenPoint: Vec2,
    ctx: DrawContext,
  ): boolean {
    const geometry = this.geometry(source, target, ctx);
    if (!geometry) return false;

    const halfWidth = (this.style(ctx).width * ctx.transform.zoom) / 2;
    return (
      distanceToPolyline(screenPoint, sampleEdgeGeometry(geometry)) <=
      halfWidth + GEOMETRY.edgeHitTolerance
    );
  }

  shapes(source: EdgeEndpoint, target: EdgeEndpoint, ctx: DrawContext): Shape[] {
    const geometry = this.geometry(source, target, ctx);
    if (!geometry) return [];

    const stroke = {
      width: this.style(ctx).width * ctx.transform.zoom,
      color: getEdgeColor(this.props.selected),
    };

    switch (geometry.kind) {
      case "loop":
        return [
          {
            kind: "cubic",
            from: geometry.from,
            control1: geometry.control1,
            control2: geometry.control2,
            to: geometry.to,
            stroke,
          },
        ];
      case "line": {
        const shapes: Shape[] = [
          { kind: "line", from: geometry.from, to: geometry.to, stroke },
        ];
        if (geometry.tip) {
          shapes.push(
            { kind: "line", from: geometry.tip.point, to: geometry.tip.left, stroke },
            { kind: "line", from: geometry.tip.point, to: geometry.tip.right, stroke },
          );
        }
        return shapes;
      }
      case "curve": {
        const shapes: Shape[] = [
          {
            kind: "quadratic",
            from: geometry.from,
            control: geometry.control,
            to: geometry.to,
            stroke,
          },
        ];
        if (geometry.tip) {
          shapes.push(
            { kind: "line", from: geometry.tip.point, to: geometry.tip.left, stroke },
            { kind: "line", from: geometry.tip.point, to: geometry.tip.right, stroke },
          );
        }
        return shapes;
      }
    }
  }
}

export const defaultNodeDisplay: NodeDisplayFactory = (props) =>
  new DefaultNodeShape(props);

export const defaultEdgeDisplay: EdgeDisplayFactory = (props) =>
  new DefaultEdgeShape(props);
