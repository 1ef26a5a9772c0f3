import {
  forceCenter,
  forceLink,
  forceManyBody,
  forceSimulation,
  type ForceLink as D3ForceLink,
  type Simulation,
  type SimulationLinkDatum,
  type SimulationNodeDatum,
} from "d3-force";
import { DEFAULT_SPAWN_SIZE, FORCE_LAYOUT } from "../config/constants";
import type { LayoutMode, NodeId } from "../types/graph";
import type { Graph } from "./graph";
import { log } from "./logger";

/**
 * Moves node locations between frames. The view calls `step` once per frame
 * while `isRunning` is true.
 */
export interface LayoutProvider {
  readonly mode: LayoutMode;
  step<N, E>(graph: Graph<N, E>): boolean;
  isRunning(): boolean;
  notifyDragStart(): void;
  restart(): void;
}

export type ForceLayoutSettings = {
  iterationCap: number;
  restartOnDrag: boolean;
  alphaMin: number;
  velocityDecay: number;
  chargeStrength: number;
  linkDistance: number;
  linkStrength: number;
  centerStrength: number;
  randomSeed: number;
};

export const DEFAULT_FORCE_LAYOUT_SETTINGS: ForceLayoutSettings = {
  iterationCap: FORCE_LAYOUT.iterationCap,
  restartOnDrag: true,
  alphaMin: FORCE_LAYOUT.alphaMin,
  velocityDecay: FORCE_LAYOUT.velocityDecay,
  chargeStrength: FORCE_LAYOUT.chargeStrength,
  linkDistance: FORCE_LAYOUT.linkDistance,
  linkStrength: FORCE_LAYOUT.linkStrength,
  centerStrength: FORCE_LAYOUT.centerStrength,
  randomSeed: FORCE_LAYOUT.randomSeed,
};

type ForceNode = SimulationNodeDatum & {
  id: NodeId;
};

type ForceLink = SimulationLinkDatum<ForceNode> & {
  source: NodeId | ForceNode;
  target: NodeId | ForceNode;
};

export function createDeterministicRandom(seed = 137): () => number {
  let value = seed;
  return () => {
    value = (value * 1664525 + 1013904223) % 4294967296;
    return value / 4294967296;
  };
}

/** Layout that leaves positions exactly where the host put them. */
export class StaticLayout implements LayoutProvider {
  readonly mode = "static";

  step<N, E>(_graph: Graph<N, E>): boolean {
    return false;
  }

  isRunning(): boolean {
    return false;
  }

  notifyDragStart(): void {}

  restart(): void {}
}

/**
 * Force-directed layout on a manually ticked d3-force simulation. One `step`
 * is one tick; after `iterationCap` ticks the layout counts as converged and
 * stays still until `restart`.
 */
export class ForceLayout implements LayoutProvider {
  readonly mode = "force";
  readonly settings: ForceLayoutSettings;

  private readonly simulation: Simulation<ForceNode, ForceLink>;
  private readonly linkForce: D3ForceLink<ForceNode, ForceLink>;
  private readonly datumById = new Map<NodeId, ForceNode>();
  private iterations = 0;

  constructor(settings: Partial<ForceLayoutSettings> = {}) {
    this.settings = { ...DEFAULT_FORCE_LAYOUT_SETTINGS, ...settings };
    const {
      alphaMin,
      iterationCap,
      velocityDecay,
      chargeStrength,
      linkDistance,
      linkStrength,
      centerStrength,
      randomSeed,
    } = this.settings;

    this.linkForce = forceLink<ForceNode, ForceLink>([])
      .id((node) => node.id)
      .distance(linkDistance)
      .strength(linkStrength);

    // Stopped right away: the view drives ticks, not d3's timer.
    this.simulation = forceSimulation<ForceNode, ForceLink>([])
      .stop()
      .randomSource(createDeterministicRandom(randomSeed))
      .alpha(1)
      .alphaMin(alphaMin)
      .alphaDecay(1 - Math.pow(alphaMin, 1 / Math.max(1, iterationCap)))
      .velocityDecay(velocityDecay)
      .force("charge", forceManyBody<ForceNode>().strength(chargeStrength))
      .force("link", this.linkForce)
      .force(
        "center",
        forceCenter<ForceNode>(DEFAULT_SPAWN_SIZE / 2, DEFAULT_SPAWN_SIZE / 2).strength(
          centerStrength,
        ),
      );
  }

  get iterationCount(): number {
    return this.iterations;
  }

  isRunning(): boolean {
    return this.iterations < this.settings.iterationCap;
  }

  restart(): void {
    this.iterations = 0;
    this.simulation.alpha(1);
    log.debug("layout", "force layout restarted");
  }

  notifyDragStart(): void {
    if (this.settings.restartOnDrag) this.restart();
  }

  step<N, E>(graph: Graph<N, E>): boolean {
    if (!this.isRunning()) return false;

    const nodes = graph.nodes();
    if (nodes.length < 2) {
      // Nothing to solve, but the step still counts toward convergence.
      this.iterations += 1;
      return false;
    }

    const liveIds = new Set<NodeId>();
    const datums = nodes.map((node) => {
      liveIds.add(node.id);
      const datum: ForceNode = this.datumById.get(node.id) ?? { id: node.id };
      datum.x = node.location.x;
      datum.y = node.location.y;
      datum.fx = node.dragged ? node.location.x : null;
      datum.fy = node.dragged ? node.location.y : null;
      this.datumById.set(node.id, datum);
      return datum;
    });
    Array.from(this.datumById.keys())
      .filter((id) => !liveIds.has(id))
      .forEach((id) => this.datumById.delete(id));

    // The solver gets no self-loops; the graph keeps them.
    const links: ForceLink[] = graph
      .edges()
      .filter((edge) => edge.source !== edge.target)
      .map((edge) => ({ source: edge.source, target: edge.target }));

    this.simulation.nodes(datums);
    this.linkForce.links(links);
    this.simulation.tick();
    this.iterations += 1;

    nodes.forEach((node) => {
      if (node.dragged) return;
      const datum = this.datumById.get(node.id);
      if (!datum || datum.x === undefined || datum.y === undefined) return;
      if (!Number.isFinite(datum.x) || !Number.isFinite(datum.y)) return;
      node.location = { x: datum.x, y: datum.y };
    });

    if (!this.isRunning()) {
      log.debug("layout", `force layout converged after ${this.iterations} steps`);
    }
    return true;
  }
}

export function createLayout(
  mode: LayoutMode,
  settings: Partial<ForceLayoutSettings> = {},
): LayoutProvider {
  return mode === "force" ? new ForceLayout(settings) : new StaticLayout();
}
