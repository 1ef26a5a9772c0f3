import { DEFAULT_SPAWN_SIZE } from "../config/constants";
import type { NodeId, Topology, Vec2 } from "../types/graph";
import { GraphError } from "./errors";
import {
  Graph,
  type EdgeInit,
  type GraphEdge,
  type GraphNode,
  type GraphOptions,
  type NodeInit,
} from "./graph";

export type NodeTransform<N> = (index: number, payload: N) => NodeInit;
export type EdgeTransform<E> = (
  index: number,
  payload: E,
  order: number,
) => EdgeInit;

export function randomLocation(
  size: number = DEFAULT_SPAWN_SIZE,
  random: () => number = Math.random,
): Vec2 {
  return { x: random() * size, y: random() * size };
}

/** Random spot inside the spawn square, label set to the node index. */
export function defaultNodeTransform<N>(index: number, _payload: N): NodeInit {
  return { location: randomLocation(), label: String(index) };
}

export function defaultEdgeTransform<E>(
  _index: number,
  _payload: E,
  _order: number,
): EdgeInit {
  return {};
}

export function addNode<N, E>(graph: Graph<N, E>, payload: N): GraphNode<N> {
  return addNodeCustom(graph, payload, defaultNodeTransform);
}

export function addNodeCustom<N, E>(
  graph: Graph<N, E>,
  payload: N,
  transform: NodeTransform<N>,
): GraphNode<N> {
  return graph.addNode(payload, transform(graph.peekNodeId(), payload));
}

export function addEdge<N, E>(
  graph: Graph<N, E>,
  source: NodeId,
  target: NodeId,
  payload: E,
): GraphEdge<E> {
  return addEdgeCustom(graph, source, target, payload, defaultEdgeTransform);
}

export function addEdgeCustom<N, E>(
  graph: Graph<N, E>,
  source: NodeId,
  target: NodeId,
  payload: E,
  transform: EdgeTransform<E>,
): GraphEdge<E> {
  const init = transform(
    graph.peekEdgeId(),
    payload,
    graph.nextOrder(source, target),
  );
  return graph.addEdge(source, target, payload, init);
}

/**
 * Builds a renderable graph from a plain topology with the default node and
 * edge transforms. Use `toGraphCustom` for deterministic placement or custom
 * labels.
 */
export function toGraph<N, E>(
  topology: Topology<N, E>,
  options: Omit<GraphOptions, "directed"> = {},
): Graph<N, E> {
  return toGraphCustom(
    topology,
    defaultNodeTransform,
    defaultEdgeTransform,
    options,
  );
}

export function toGraphCustom<N, E>(
  topology: Topology<N, E>,
  nodeTransform: NodeTransform<N>,
  edgeTransform: EdgeTransform<E>,
  options: Omit<GraphOptions, "directed"> = {},
): Graph<N, E> {
  const graph = new Graph<N, E>({ ...options, directed: topology.directed });

  const idByIndex = topology.nodes.map(
    (payload, index) => graph.addNode(payload, nodeTransform(index, payload)).id,
  );

  topology.edges.forEach((edge, index) => {
    const source = idByIndex[edge.source];
    const target = idByIndex[edge.target];
    if (source === undefined || target === undefined) {
      throw new GraphError(
        "node-not-found",
        `topology edge ${index} references ${edge.source} -> ${edge.target}`,
      );
    }

    const init = edgeTransform(
      index,
      edge.payload,
      graph.nextOrder(source, target),
    );
    graph.addEdge(source, target, edge.payload, init);
  });

  return graph;
}
