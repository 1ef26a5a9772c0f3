import { NODE_DEFAULTS } from "../config/constants";
import type { EdgeId, EdgeStyle, NodeId, NodeStyle, Vec2 } from "../types/graph";
import { GraphError } from "./errors";
import type { EdgeEndpoint } from "./geometry";
import {
  defaultEdgeDisplay,
  defaultNodeDisplay,
  type DisplayEdge,
  type DisplayNode,
  type DrawContext,
  type EdgeDisplayFactory,
  type NodeDisplayFactory,
} from "./shapes";
import { canvasToScreen, screenToCanvas, type Transform } from "./viewport";

export type GraphNode<N> = {
  readonly id: NodeId;
  payload: N;
  location: Vec2;
  label: string;
  style: NodeStyle;
  selected: boolean;
  dragged: boolean;
  // Incident edge count, refreshed by the computed-state pass.
  connections: number;
  display: DisplayNode;
};

export type GraphEdge<E> = {
  readonly id: EdgeId;
  readonly source: NodeId;
  readonly target: NodeId;
  // Rank among edges sharing the unordered endpoint pair, fixed at creation.
  readonly order: number;
  payload: E;
  // Fields left unset fall back to the view's configured edge style.
  style: Partial<EdgeStyle>;
  selected: boolean;
  display: DisplayEdge;
};

export type NodeInit = {
  location?: Vec2;
  label?: string;
  radius?: number;
};

export type EdgeInit = {
  style?: Partial<EdgeStyle>;
};

export type GraphOptions = {
  directed?: boolean;
  nodeDisplay?: NodeDisplayFactory;
  edgeDisplay?: EdgeDisplayFactory;
};

function pairKey(a: NodeId, b: NodeId): string {
  return a < b ? `${a}::${b}` : `${b}::${a}`;
}

/**
 * Multigraph of renderable nodes and edges. Ids are stable and never reused;
 * iteration follows insertion order.
 */
export class Graph<N, E> {
  readonly directed: boolean;

  private readonly nodesById = new Map<NodeId, GraphNode<N>>();
  private readonly edgesById = new Map<EdgeId, GraphEdge<E>>();
  private readonly edgeIdsByPair = new Map<string, Set<EdgeId>>();
  private readonly nodeDisplay: NodeDisplayFactory;
  private readonly edgeDisplay: EdgeDisplayFactory;
  private nextNodeId = 0;
  private nextEdgeId = 0;

  constructor(options: GraphOptions = {}) {
    this.directed = options.directed ?? true;
    this.nodeDisplay = options.nodeDisplay ?? defaultNodeDisplay;
    this.edgeDisplay = options.edgeDisplay ?? defaultEdgeDisplay;
  }

  get nodeCount(): number {
    return this.nodesById.size;
  }

  get edgeCount(): number {
    return this.edgesById.size;
  }

  /** Id the next added node will receive. */
  peekNodeId(): NodeId {
    return this.nextNodeId;
  }

  /** Id the next added edge will receive. */
  peekEdgeId(): EdgeId {
    return this.nextEdgeId;
  }

  addNode(payload: N, init: NodeInit = {}): GraphNode<N> {
    const id = this.nextNodeId;
    this.nextNodeId += 1;

    const location = init.location ?? { x: 0, y: 0 };
    const label = init.label ?? String(id);
    const style = { radius: init.radius ?? NODE_DEFAULTS.radius };

    const node: GraphNode<N> = {
      id,
      payload,
      location,
      label,
      style,
      selected: false,
      dragged: false,
      connections: 0,
      display: this.nodeDisplay({
        id,
        location,
        label,
        radius: style.radius,
        selected: false,
        dragged: false,
      }),
    };
    this.nodesById.set(id, node);
    return node;
  }

  /** Order index the next edge between `source` and `target` would get. */
  nextOrder(source: NodeId, target: NodeId): number {
    const siblings = this.edgeIdsByPair.get(pairKey(source, target));
    if (!siblings || siblings.size === 0) return 0;

    let highest = -1;
    siblings.forEach((edgeId) => {
      const edge = this.edgesById.get(edgeId);
      if (edge) highest = Math.max(highest, edge.order);
    });
    return highest + 1;
  }

  addEdge(
    source: NodeId,
    target: NodeId,
    payload: E,
    init: EdgeInit = {},
  ): GraphEdge<E> {
    if (!this.nodesById.has(source)) {
      throw new GraphError("node-not-found", `edge source ${source}`);
    }
    if (!this.nodesById.has(target)) {
      throw new GraphError("node-not-found", `edge target ${target}`);
    }

    const id = this.nextEdgeId;
    this.nextEdgeId += 1;

    const order = this.nextOrder(source, target);
    const style = { ...init.style };
    const key = pairKey(source, target);
    const siblings = this.edgeIdsByPair.get(key) ?? new Set<EdgeId>();
    siblings.add(id);
    this.edgeIdsByPair.set(key, siblings);

    const edge: GraphEdge<E> = {
      id,
      source,
      target,
      order,
      payload,
      style,
      selected: false,
      display: this.edgeDisplay({
        id,
        source,
        target,
        order,
        siblings: siblings.size,
        style,
        selected: false,
      }),
    };
    this.edgesById.set(id, edge);
    return edge;
  }

  removeEdge(id: EdgeId): boolean {
    const edge = this.edgesById.get(id);
    if (!edge) return false;

    this.edgesById.delete(id);
    const key = pairKey(edge.source, edge.target);
    const siblings = this.edgeIdsByPair.get(key);
    siblings?.delete(id);
    if (siblings && siblings.size === 0) this.edgeIdsByPair.delete(key);
    return true;
  }

  /** Removes the node and every edge touching it. */
  removeNode(id: NodeId): boolean {
    if (!this.nodesById.has(id)) return false;

    Array.from(this.edgesById.values())
      .filter((edge) => edge.source === id || edge.target === id)
      .forEach((edge) => this.removeEdge(edge.id));
    this.nodesById.delete(id);
    return true;
  }

  node(id: NodeId): GraphNode<N> | undefined {
    return this.nodesById.get(id);
  }

  edge(id: EdgeId): GraphEdge<E> | undefined {
    return this.edgesById.get(id);
  }

  nodes(): GraphNode<N>[] {
    return Array.from(this.nodesById.values());
  }

  edges(): GraphEdge<E>[] {
    return Array.from(this.edgesById.values());
  }

  edgeEndpoints(id: EdgeId): [NodeId, NodeId] | undefined {
    const edge = this.edgesById.get(id);
    return edge ? [edge.source, edge.target] : undefined;
  }

  /** Edges sharing the unordered pair {a, b}, sorted by order index. */
  edgesConnecting(a: NodeId, b: NodeId): GraphEdge<E>[] {
    const siblings = this.edgeIdsByPair.get(pairKey(a, b));
    if (!siblings) return [];

    return Array.from(siblings)
      .map((edgeId) => this.edgesById.get(edgeId))
      .filter((edge): edge is GraphEdge<E> => edge !== undefined)
      .sort((left, right) => left.order - right.order);
  }

  siblingCount(edge: GraphEdge<E>): number {
    return this.edgeIdsByPair.get(pairKey(edge.source, edge.target))?.size ?? 0;
  }

  /** Edges with one end on `id`. A self-loop is listed once. */
  incidentEdges(id: NodeId): GraphEdge<E>[] {
    return this.edges().filter((edge) => edge.source === id || edge.target === id);
  }

  nodeRadius(node: GraphNode<N>, edgeRadiusWeight: number): number {
    return node.style.radius + node.connections * edgeRadiusWeight;
  }

  refreshNode(node: GraphNode<N>, edgeRadiusWeight: number): void {
    node.display.update({
      id: node.id,
      location: node.location,
      label: node.label,
      radius: this.nodeRadius(node, edgeRadiusWeight),
      selected: node.selected,
      dragged: node.dragged,
    });
  }

  /** Pushes current node and edge state into their display strategies. */
  refreshDisplays(edgeRadiusWeight: number): void {
    this.nodesById.forEach((node) => this.refreshNode(node, edgeRadiusWeight));

    this.edgesById.forEach((edge) => {
      edge.display.update({
        id: edge.id,
        source: edge.source,
        target: edge.target,
        order: edge.order,
        siblings: this.siblingCount(edge),
        style: edge.style,
        selected: edge.selected,
      });
    });
  }

  screenEndpoint(
    node: GraphNode<N>,
    transform: Transform,
    edgeRadiusWeight: number,
  ): EdgeEndpoint {
    return {
      id: node.id,
      center: canvasToScreen(transform, node.location),
      radius: this.nodeRadius(node, edgeRadiusWeight) * transform.zoom,
    };
  }

  /**
   * First node, in iteration order, whose display contains the point. Linear
   * scan.
   */
  nodeByScreenPos(transform: Transform, screenPos: Vec2): GraphNode<N> | undefined {
    const canvasPos = screenToCanvas(transform, screenPos);
    return this.nodes().find((node) => node.display.isInside(canvasPos));
  }

  edgeByScreenPos(ctx: DrawContext, screenPos: Vec2): GraphEdge<E> | undefined {
    const weight = ctx.style.edgeRadiusWeight;
    return this.edges().find((edge) => {
      const source = this.nodesById.get(edge.source);
      const target = this.nodesById.get(edge.target);
      if (!source || !target) return false;

      return edge.display.isInside(
        this.screenEndpoint(source, ctx.transform, weight),
        this.screenEndpoint(target, ctx.transform, weight),
        screenPos,
        ctx,
      );
    });
  }
}
