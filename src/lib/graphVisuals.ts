export type NodeVisualState = {
  selected: boolean;
  dragged: boolean;
};

export type NodeColors = {
  fill: string;
  stroke: string;
};

const NODE_COLORS: Record<"idle" | "selected" | "dragged", NodeColors> = {
  idle: { fill: "rgba(105, 122, 176, 0.94)", stroke: "rgba(147, 169, 225, 0.66)" },
  selected: { fill: "rgba(84, 149, 166, 0.96)", stroke: "rgba(121, 194, 210, 0.9)" },
  dragged: { fill: "rgba(236, 164, 84, 0.98)", stroke: "rgba(246, 198, 140, 0.9)" },
};

const EDGE_COLORS = {
  idle: "rgba(118, 130, 160, 0.86)",
  selected: "rgba(84, 149, 166, 0.96)",
};

export const LABEL_COLOR = "rgba(67, 73, 88, 0.9)";

// Dragging wins over selection.
export function getNodeColors(state: NodeVisualState): NodeColors {
  if (state.dragged) return NODE_COLORS.dragged;
  if (state.selected) return NODE_COLORS.selected;
  return NODE_COLORS.idle;
}

export function getEdgeColor(selected: boolean): string {
  return selected ? EDGE_COLORS.selected : EDGE_COLORS.idle;
}

export function shouldShowLabel(
  state: NodeVisualState,
  labelsAlways: boolean,
): boolean {
  return labelsAlways || state.selected || state.dragged;
}
