import { type ReactNode } from "react";
import type { GraphViewSettingsInput } from "../config/settings";
import type { GraphEvent } from "../lib/events";
import type { Graph } from "../lib/graph";
import type { FrameOutput } from "../lib/graphView";
import type { LayoutProvider } from "../lib/layoutEngine";
import type { LayoutMode } from "../types/graph";
import { useGraphView } from "../hooks/useGraphView";

type GraphCanvasProps<N, E> = {
  graph: Graph<N, E>;
  width: number;
  height: number;
  revision?: number;
  settings?: GraphViewSettingsInput;
  layout?: LayoutProvider | LayoutMode;
  className?: string;
  ariaLabel?: string;
  controlsOverlay?: ReactNode;
  onEvent?: (event: GraphEvent) => void;
  onFrame?: (output: FrameOutput) => void;
};

export function GraphCanvas<N, E>(props: GraphCanvasProps<N, E>) {
  const {
    graph,
    width,
    height,
    revision,
    settings,
    layout,
    className,
    ariaLabel = "Graph view",
    controlsOverlay,
    onEvent,
    onFrame,
  } = props;

  const { canvasRef, handlers } = useGraphView(graph, {
    width,
    height,
    revision,
    settings,
    layout,
    onEvent,
    onFrame,
  });

  return (
    <section className={className ?? "graph-canvas"} style={{ position: "relative", width, height }}>
      {controlsOverlay ? (
        <div className="graph-canvas-controls">{controlsOverlay}</div>
      ) : null}
      <canvas
        ref={canvasRef}
        width={width}
        height={height}
        role="application"
        aria-label={ariaLabel}
        style={{ touchAction: "none" }}
        onContextMenu={(event) => {
          event.preventDefault();
        }}
        {...handlers}
      />
    </section>
  );
}
