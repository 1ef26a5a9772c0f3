export type Vec2 = {
  x: number;
  y: number;
};

export type Rect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type Bounds = {
  min: Vec2;
  max: Vec2;
};

export type NodeId = number;
export type EdgeId = number;

export type NodeStyle = {
  radius: number;
};

export type EdgeStyle = {
  width: number;
  curveSize: number;
  tipSize: number;
  tipAngle: number;
};

export type ViewportState = {
  zoom: number;
  pan: Vec2;
  rect: Rect;
  firstFrame: boolean;
};

export type LayoutMode = "static" | "force";

export type InteractionState =
  | { kind: "idle" }
  | { kind: "dragging"; nodeId: NodeId }
  | { kind: "panning" };

// Input topology accepted by the ingestion helpers. Edge endpoints index into
// `nodes`.
export type Topology<N, E> = {
  directed: boolean;
  nodes: N[];
  edges: Array<{ source: number; target: number; payload: E }>;
};

export type PointerFrame = {
  position: Vec2 | null;
  pressOrigin: Vec2 | null;
  delta: Vec2;
  down: boolean;
  dragStarted: boolean;
  released: boolean;
  clicked: boolean;
  doubleClicked: boolean;
};

export type FrameInput = {
  rect: Rect;
  pointer: PointerFrame;
  // Relative scale factor of this frame's pinch/scroll; 1 means no gesture.
  zoomDelta: number;
};

export type StrokeStyle = {
  width: number;
  color: string;
};

export type Shape =
  | { kind: "circle"; center: Vec2; radius: number; fill: string; stroke?: StrokeStyle }
  | { kind: "line"; from: Vec2; to: Vec2; stroke: StrokeStyle }
  | {
      kind: "quadratic";
      from: Vec2;
      control: Vec2;
      to: Vec2;
      stroke: StrokeStyle;
    }
  | {
      kind: "cubic";
      from: Vec2;
      control1: Vec2;
      control2: Vec2;
      to: Vec2;
      stroke: StrokeStyle;
    }
  | { kind: "text"; position: Vec2; text: string; size: number; color: string };
