export type {
  Bounds,
  EdgeId,
  EdgeStyle,
  FrameInput,
  InteractionState,
  LayoutMode,
  NodeId,
  NodeStyle,
  PointerFrame,
  Rect,
  Shape,
  StrokeStyle,
  Topology,
  Vec2,
  ViewportState,
} from "./types/graph";
export {
  DEFAULT_SETTINGS,
  isSelectionEnabled,
  resolveSettings,
} from "./config/settings";
export type {
  GraphViewSettings,
  GraphViewSettingsInput,
  InteractionSettings,
  NavigationSettings,
  StyleSettings,
} from "./config/settings";
export { GraphError } from "./lib/errors";
export type { GraphErrorCode } from "./lib/errors";
export { getLogLevel, log, setLogLevel } from "./lib/logger";
export type { LogLevel } from "./lib/logger";
export { Graph } from "./lib/graph";
export type { EdgeInit, GraphEdge, GraphNode, GraphOptions, NodeInit } from "./lib/graph";
export {
  addEdge,
  addEdgeCustom,
  addNode,
  addNodeCustom,
  defaultEdgeTransform,
  defaultNodeTransform,
  randomLocation,
  toGraph,
  toGraphCustom,
} from "./lib/transform";
export type { EdgeTransform, NodeTransform } from "./lib/transform";
export { callbackSender, EventChannel, EventPublisher } from "./lib/events";
export type { EventSender, GraphEvent, GraphEventType } from "./lib/events";
export { computeState } from "./lib/computed";
export type { ComputedState } from "./lib/computed";
export {
  DefaultEdgeShape,
  DefaultNodeShape,
  defaultEdgeDisplay,
  defaultNodeDisplay,
} from "./lib/shapes";
export type {
  DisplayEdge,
  DisplayNode,
  DrawContext,
  EdgeDisplayFactory,
  EdgeProps,
  NodeDisplayFactory,
  NodeProps,
} from "./lib/shapes";
export { computeEdgeGeometry } from "./lib/geometry";
export type { ArrowTip, EdgeEndpoint, EdgeGeometry } from "./lib/geometry";
export { canvasToScreen, fitToScreen, screenToCanvas, zoomAt } from "./lib/viewport";
export type { Transform } from "./lib/viewport";
export {
  createViewportStore,
  defaultViewportState,
  getTransform,
} from "./state/viewportStore";
export type { ViewportStore, ViewportStoreState } from "./state/viewportStore";
export { InteractionController } from "./lib/controller";
export {
  createLayout,
  DEFAULT_FORCE_LAYOUT_SETTINGS,
  ForceLayout,
  StaticLayout,
} from "./lib/layoutEngine";
export type { ForceLayoutSettings, LayoutProvider } from "./lib/layoutEngine";
export { GraphView } from "./lib/graphView";
export type { FrameOutput, GraphViewOptions } from "./lib/graphView";
export { drawGraph } from "./lib/drawer";
export { idleFrame, PointerTracker } from "./lib/input";
export type { PointerTrackerOptions } from "./lib/input";
export { paintShapes } from "./lib/painter";
export type { PaintTarget } from "./lib/painter";
export { useGraphView } from "./hooks/useGraphView";
export type { UseGraphViewOptions } from "./hooks/useGraphView";
export { GraphCanvas } from "./components/GraphCanvas";
