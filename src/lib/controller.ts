import { isSelectionEnabled, type GraphViewSettings } from "../config/settings";
import type { FrameInput, InteractionState, NodeId } from "../types/graph";
import type { ComputedState } from "./computed";
import type { EventPublisher } from "./events";
import type { Graph, GraphNode } from "./graph";
import type { LayoutProvider } from "./layoutEngine";
import { log } from "./logger";
import type { ViewportStore } from "../state/viewportStore";
import { getTransform } from "../state/viewportStore";
import { isZero, scale } from "./vector";

export type InteractionContext<N, E> = {
  graph: Graph<N, E>;
  viewport: ViewportStore;
  settings: GraphViewSettings;
  computed: ComputedState;
  publisher: EventPublisher;
  layout: LayoutProvider;
};

/**
 * Turns one frame of pointer input into graph and viewport mutations.
 *
 * States: idle, dragging(node), panning. Each frame runs, in order:
 * fit-to-screen, zoom, drag start, drag/pan move, release, click. A frame
 * that fits the viewport skips zoom and the drag steps.
 */
export class InteractionController {
  private state: InteractionState = { kind: "idle" };

  get current(): InteractionState {
    return this.state;
  }

  reset(): void {
    this.state = { kind: "idle" };
  }

  process<N, E>(ctx: InteractionContext<N, E>, input: FrameInput): void {
    const fitted = this.handleFitToScreen(ctx);
    if (!fitted) {
      this.handleZoom(ctx, input);
      this.handleDragStart(ctx, input);
      this.handleDragMove(ctx, input);
    }
    this.handleRelease(ctx, input);
    this.handleClick(ctx, input);
  }

  handleFitToScreen<N, E>(ctx: InteractionContext<N, E>): boolean {
    const viewport = ctx.viewport.getState();
    if (!viewport.firstFrame && !ctx.settings.navigation.fitToScreenEnabled) {
      return false;
    }

    const applied = viewport.fitToScreen(
      ctx.computed.bounds,
      ctx.settings.navigation.screenPadding,
    );
    // An unmeasured surface keeps the initial fit pending.
    if (applied) viewport.markFirstFrameDone();
    return applied;
  }

  handleZoom<N, E>(ctx: InteractionContext<N, E>, input: FrameInput): void {
    const { navigation } = ctx.settings;
    if (!navigation.zoomAndPanEnabled) return;

    const { zoomDelta } = input;
    if (!Number.isFinite(zoomDelta) || zoomDelta === 1) return;

    const step = navigation.zoomSpeed * Math.sign(zoomDelta - 1);
    const diff = ctx.viewport.getState().zoomAt(step, input.pointer.position);
    if (diff !== 0) ctx.publisher.publish({ type: "Zoom", delta: diff });
  }

  handleDragStart<N, E>(ctx: InteractionContext<N, E>, input: FrameInput): void {
    const { pointer } = input;
    if (!pointer.dragStarted || this.state.kind !== "idle") return;

    const origin = pointer.pressOrigin ?? pointer.position;
    const node =
      origin && ctx.settings.interaction.draggingEnabled
        ? ctx.graph.nodeByScreenPos(getTransform(ctx.viewport.getState()), origin)
        : undefined;

    if (node) {
      node.dragged = true;
      this.state = { kind: "dragging", nodeId: node.id };
      ctx.publisher.publish({ type: "NodeDragStart", id: node.id });
      ctx.layout.notifyDragStart();
      return;
    }

    if (ctx.settings.navigation.zoomAndPanEnabled) {
      this.state = { kind: "panning" };
    }
  }

  handleDragMove<N, E>(ctx: InteractionContext<N, E>, input: FrameInput): void {
    const { delta } = input.pointer;
    if (isZero(delta)) return;

    const state = this.state;
    if (state.kind === "dragging") {
      const node = this.lookupNode(ctx, state.nodeId);
      if (!node) {
        this.state = { kind: "idle" };
        return;
      }

      const canvasDelta = scale(delta, 1 / ctx.viewport.getState().zoom);
      node.location = {
        x: node.location.x + canvasDelta.x,
        y: node.location.y + canvasDelta.y,
      };
      ctx.graph.refreshNode(node, ctx.settings.style.edgeRadiusWeight);
      ctx.publisher.publish({ type: "NodeMove", id: node.id, delta: canvasDelta });
      return;
    }

    if (state.kind === "panning") {
      const viewport = ctx.viewport.getState();
      viewport.panBy(delta);
      ctx.publisher.publish({
        type: "Pan",
        delta,
        newPan: ctx.viewport.getState().pan,
      });
    }
  }

  handleRelease<N, E>(ctx: InteractionContext<N, E>, input: FrameInput): void {
    if (!input.pointer.released) return;

    const state = this.state;
    this.state = { kind: "idle" };
    if (state.kind !== "dragging") return;

    const node = this.lookupNode(ctx, state.nodeId);
    if (!node) return;

    node.dragged = false;
    ctx.graph.refreshNode(node, ctx.settings.style.edgeRadiusWeight);
    ctx.publisher.publish({ type: "NodeDragEnd", id: node.id });
  }

  handleClick<N, E>(ctx: InteractionContext<N, E>, input: FrameInput): void {
    const { pointer } = input;
    if (!pointer.clicked && !pointer.doubleClicked) return;

    const { interaction } = ctx.settings;
    const selectable = isSelectionEnabled(interaction);
    if (!interaction.clickingEnabled && !selectable) return;

    if (!pointer.position) {
      log.debug("interaction", "click without pointer position ignored");
      return;
    }

    const node = ctx.graph.nodeByScreenPos(
      getTransform(ctx.viewport.getState()),
      pointer.position,
    );

    if (!node) {
      if (selectable) this.deselectAll(ctx);
      return;
    }

    // The first half of a double click was reported as a click on an earlier
    // frame; this one only reports the double click and leaves selection alone.
    if (pointer.doubleClicked) {
      if (interaction.clickingEnabled) {
        ctx.publisher.publish({ type: "NodeDoubleClick", id: node.id });
      }
      return;
    }

    if (interaction.clickingEnabled) {
      ctx.publisher.publish({ type: "NodeClick", id: node.id });
    }
    if (!selectable) return;

    if (node.selected) {
      this.deselectNode(ctx, node.id);
      return;
    }

    if (!interaction.selectionMultiEnabled) this.deselectAll(ctx);
    this.selectNode(ctx, node);
  }

  private selectNode<N, E>(ctx: InteractionContext<N, E>, node: GraphNode<N>): void {
    node.selected = true;
    ctx.graph.refreshNode(node, ctx.settings.style.edgeRadiusWeight);
    ctx.publisher.publish({ type: "NodeSelect", id: node.id });
  }

  private deselectNode<N, E>(ctx: InteractionContext<N, E>, id: NodeId): void {
    const node = this.lookupNode(ctx, id);
    if (!node) return;

    node.selected = false;
    ctx.graph.refreshNode(node, ctx.settings.style.edgeRadiusWeight);
    ctx.publisher.publish({ type: "NodeDeselect", id });
  }

  private deselectAll<N, E>(ctx: InteractionContext<N, E>): void {
    ctx.computed.selectedNodes.forEach((id) => this.deselectNode(ctx, id));
  }

  private lookupNode<N, E>(
    ctx: InteractionContext<N, E>,
    id: NodeId,
  ): GraphNode<N> | undefined {
    const node = ctx.graph.node(id);
    if (!node) log.debug("interaction", `node ${id} no longer exists`);
    return node;
  }
}
