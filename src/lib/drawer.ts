import type { Shape } from "../types/graph";
import type { Graph } from "./graph";
import { Layers } from "./layers";
import type { DrawContext } from "./shapes";

/**
 * Queues every edge and node of the graph into layers and returns the shapes
 * in paint order. Selected or dragged elements go to the top layer.
 */
export function drawGraph<N, E>(graph: Graph<N, E>, ctx: DrawContext): Shape[] {
  const layers = new Layers();
  const weight = ctx.style.edgeRadiusWeight;

  graph.edges().forEach((edge) => {
    const source = graph.node(edge.source);
    const target = graph.node(edge.target);
    if (!source || !target) return;

    layers.addEdge(
      edge.display.shapes(
        graph.screenEndpoint(source, ctx.transform, weight),
        graph.screenEndpoint(target, ctx.transform, weight),
        ctx,
      ),
      edge.selected,
    );
  });

  graph.nodes().forEach((node) => {
    layers.addNode(node.display.shapes(ctx), node.selected || node.dragged);
  });

  return layers.shapes();
}
