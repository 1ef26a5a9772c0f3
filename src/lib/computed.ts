import type { StyleSettings } from "../config/settings";
import type { Bounds, EdgeId, NodeId } from "../types/graph";
import type { Graph } from "./graph";

export type ComputedState = {
  dragged: NodeId | null;
  selectedNodes: NodeId[];
  selectedEdges: EdgeId[];
  bounds: Bounds;
};

/**
 * Per-frame snapshot read from the graph's own flags. Also refreshes each
 * node's connection count and every display strategy, so it has to run
 * before any interaction handling in the frame.
 */
export function computeState<N, E>(
  graph: Graph<N, E>,
  style: StyleSettings,
): ComputedState {
  const min = { x: Number.POSITIVE_INFINITY, y: Number.POSITIVE_INFINITY };
  const max = { x: Number.NEGATIVE_INFINITY, y: Number.NEGATIVE_INFINITY };
  const connectionsById = new Map<NodeId, number>();
  const selectedNodes: NodeId[] = [];
  const selectedEdges: EdgeId[] = [];
  let dragged: NodeId | null = null;

  const edges = graph.edges();
  edges.forEach((edge) => {
    connectionsById.set(edge.source, (connectionsById.get(edge.source) ?? 0) + 1);
    if (edge.target !== edge.source) {
      connectionsById.set(edge.target, (connectionsById.get(edge.target) ?? 0) + 1);
    }
    if (edge.selected) selectedEdges.push(edge.id);
  });

  const nodes = graph.nodes();
  nodes.forEach((node) => {
    node.connections = connectionsById.get(node.id) ?? 0;

    const { x, y } = node.location;
    if (x < min.x) min.x = x;
    if (x > max.x) max.x = x;
    if (y < min.y) min.y = y;
    if (y > max.y) max.y = y;

    if (node.selected) selectedNodes.push(node.id);
    if (node.dragged && dragged === null) dragged = node.id;
  });

  graph.refreshDisplays(style.edgeRadiusWeight);

  return {
    dragged,
    selectedNodes,
    selectedEdges,
    bounds:
      nodes.length === 0
        ? { min: { x: 0, y: 0 }, max: { x: 0, y: 0 } }
        : { min, max },
  };
}
