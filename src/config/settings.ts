import type { EdgeStyle } from "../types/graph";
import { log } from "../lib/logger";
import { EDGE_DEFAULTS } from "./constants";

export type InteractionSettings = {
  clickingEnabled: boolean;
  draggingEnabled: boolean;
  selectionEnabled: boolean;
  // Implies selectionEnabled.
  selectionMultiEnabled: boolean;
};

export type NavigationSettings = {
  zoomAndPanEnabled: boolean;
  fitToScreenEnabled: boolean;
  zoomSpeed: number;
  screenPadding: number;
};

export type StyleSettings = {
  edgeRadiusWeight: number;
  labelsAlways: boolean;
  edge: EdgeStyle;
};

export type GraphViewSettings = {
  interaction: InteractionSettings;
  navigation: NavigationSettings;
  style: StyleSettings;
};

export type GraphViewSettingsInput = {
  interaction?: Partial<InteractionSettings>;
  navigation?: Partial<NavigationSettings>;
  style?: Partial<Omit<StyleSettings, "edge">> & { edge?: Partial<EdgeStyle> };
};

export const DEFAULT_SETTINGS: GraphViewSettings = {
  interaction: {
    clickingEnabled: false,
    draggingEnabled: false,
    selectionEnabled: false,
    selectionMultiEnabled: false,
  },
  navigation: {
    zoomAndPanEnabled: false,
    fitToScreenEnabled: true,
    zoomSpeed: 0.1,
    screenPadding: 0.3,
  },
  style: {
    edgeRadiusWeight: 1,
    labelsAlways: false,
    edge: { ...EDGE_DEFAULTS },
  },
};

function checkedNumber(
  name: string,
  value: number | undefined,
  fallback: number,
  isValid: (value: number) => boolean,
): number {
  if (value === undefined) return fallback;
  if (Number.isFinite(value) && isValid(value)) return value;
  log.warn("settings", `invalid ${name}, using ${fallback}`, value);
  return fallback;
}

const positive = (value: number) => value > 0;
const nonNegative = (value: number) => value >= 0;

export function resolveSettings(
  input: GraphViewSettingsInput = {},
): GraphViewSettings {
  const defaults = DEFAULT_SETTINGS;
  const navigation = input.navigation ?? {};
  const style = input.style ?? {};
  const edge = style.edge ?? {};

  return {
    interaction: { ...defaults.interaction, ...input.interaction },
    navigation: {
      zoomAndPanEnabled:
        navigation.zoomAndPanEnabled ?? defaults.navigation.zoomAndPanEnabled,
      fitToScreenEnabled:
        navigation.fitToScreenEnabled ?? defaults.navigation.fitToScreenEnabled,
      zoomSpeed: checkedNumber(
        "navigation.zoomSpeed",
        navigation.zoomSpeed,
        defaults.navigation.zoomSpeed,
        (value) => value > 0 && value < 1,
      ),
      screenPadding: checkedNumber(
        "navigation.screenPadding",
        navigation.screenPadding,
        defaults.navigation.screenPadding,
        nonNegative,
      ),
    },
    style: {
      edgeRadiusWeight: checkedNumber(
        "style.edgeRadiusWeight",
        style.edgeRadiusWeight,
        defaults.style.edgeRadiusWeight,
        nonNegative,
      ),
      labelsAlways: style.labelsAlways ?? defaults.style.labelsAlways,
      edge: {
        width: checkedNumber(
          "style.edge.width",
          edge.width,
          defaults.style.edge.width,
          positive,
        ),
        curveSize: checkedNumber(
          "style.edge.curveSize",
          edge.curveSize,
          defaults.style.edge.curveSize,
          nonNegative,
        ),
        tipSize: checkedNumber(
          "style.edge.tipSize",
          edge.tipSize,
          defaults.style.edge.tipSize,
          nonNegative,
        ),
        tipAngle: checkedNumber(
          "style.edge.tipAngle",
          edge.tipAngle,
          defaults.style.edge.tipAngle,
          (value) => value > 0 && value < Math.PI / 2,
        ),
      },
    },
  };
}

export function isSelectionEnabled(settings: InteractionSettings): boolean {
  return settings.selectionEnabled || settings.selectionMultiEnabled;
}
