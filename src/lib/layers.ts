import type { Shape } from "../types/graph";

type Layer = {
  edges: Shape[];
  nodes: Shape[];
};

function emptyLayer(): Layer {
  return { edges: [], nodes: [] };
}

/**
 * Draw queue with a base and a top layer. Within a layer edges paint under
 * nodes; the whole top layer paints over the base layer.
 */
export class Layers {
  private readonly base = emptyLayer();
  private readonly top = emptyLayer();

  addEdge(shapes: Shape[], highlighted: boolean): void {
    (highlighted ? this.top : this.base).edges.push(...shapes);
  }

  addNode(shapes: Shape[], highlighted: boolean): void {
    (highlighted ? this.top : this.base).nodes.push(...shapes);
  }

  shapes(): Shape[] {
    return [
      ...this.base.edges,
      ...this.base.nodes,
      ...this.top.edges,
      ...this.top.nodes,
    ];
  }
}
