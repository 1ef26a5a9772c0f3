import {
  resolveSettings,
  type GraphViewSettings,
  type GraphViewSettingsInput,
} from "../config/settings";
import { getTransform, type ViewportStore } from "../state/viewportStore";
import type {
  FrameInput,
  InteractionState,
  LayoutMode,
  NodeId,
  Shape,
  Vec2,
} from "../types/graph";
import { computeState, type ComputedState } from "./computed";
import { InteractionController } from "./controller";
import { drawGraph } from "./drawer";
import { EventPublisher, type EventSender } from "./events";
import type { Graph } from "./graph";
import { createLayout, type LayoutProvider } from "./layoutEngine";
import type { DrawContext } from "./shapes";
import { canvasToScreen } from "./viewport";

export type GraphViewOptions = {
  settings?: GraphViewSettingsInput;
  layout?: LayoutProvider | LayoutMode;
  events?: EventSender;
};

export type FrameOutput = {
  shapes: Shape[];
  computed: ComputedState;
  interaction: InteractionState;
  screenPositions: Map<NodeId, Vec2>;
  // True while the layout is still moving nodes or a gesture is in progress.
  requestRepaint: boolean;
};

/**
 * Per-frame pipeline over a graph the host owns: computed state, interaction,
 * layout step, then shape generation. Viewport state lives in the store the
 * host passes to `update`, one store per surface.
 */
export class GraphView<N, E> {
  readonly graph: Graph<N, E>;
  readonly layout: LayoutProvider;
  private settingsValue: GraphViewSettings;
  private readonly controller = new InteractionController();
  private readonly publisher: EventPublisher;

  constructor(graph: Graph<N, E>, options: GraphViewOptions = {}) {
    this.graph = graph;
    this.settingsValue = resolveSettings(options.settings);
    this.layout =
      typeof options.layout === "object"
        ? options.layout
        : createLayout(options.layout ?? "static");
    this.publisher = new EventPublisher(options.events);
  }

  get settings(): GraphViewSettings {
    return this.settingsValue;
  }

  get interaction(): InteractionState {
    return this.controller.current;
  }

  configure(settings: GraphViewSettingsInput): void {
    this.settingsValue = resolveSettings(settings);
  }

  update(viewport: ViewportStore, input: FrameInput): FrameOutput {
    const { graph, layout } = this;
    const settings = this.settingsValue;

    viewport.getState().setRect(input.rect);
    const computed = computeState(graph, settings.style);

    this.controller.process(
      {
        graph,
        viewport,
        settings,
        computed,
        publisher: this.publisher,
        layout,
      },
      input,
    );

    if (layout.isRunning()) layout.step(graph);

    const ctx = this.drawContext(viewport);
    graph.refreshDisplays(settings.style.edgeRadiusWeight);
    const shapes = drawGraph(graph, ctx);

    const screenPositions = new Map<NodeId, Vec2>();
    graph.nodes().forEach((node) => {
      screenPositions.set(node.id, canvasToScreen(ctx.transform, node.location));
    });

    return {
      shapes,
      computed,
      interaction: this.controller.current,
      screenPositions,
      requestRepaint:
        layout.isRunning() || this.controller.current.kind !== "idle",
    };
  }

  drawContext(viewport: ViewportStore): DrawContext {
    return {
      transform: getTransform(viewport.getState()),
      style: this.settingsValue.style,
      directed: this.graph.directed,
    };
  }

  /** Drops any in-flight gesture; the next frame starts idle. */
  resetInteraction(): void {
    this.controller.reset();
  }
}
