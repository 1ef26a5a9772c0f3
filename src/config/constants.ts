export const DEFAULT_SPAWN_SIZE = 250;

export const NODE_DEFAULTS = {
  radius: 5,
};

export const EDGE_DEFAULTS = {
  width: 2,
  curveSize: 20,
  tipSize: 15,
  tipAngle: Math.PI / 6,
};

// Used by fit-to-screen when every node shares one location.
export const DEFAULT_FIT_DIAGONAL = { x: 1, y: 100 };

export const GEOMETRY = {
  loopSizeFactor: 4,
  loopAttachAngle: Math.PI / 4,
  curveSamples: 16,
  edgeHitTolerance: 3,
  labelSize: 12,
};

export const POINTER = {
  dragThreshold: 3,
  doubleClickMs: 300,
  doubleClickDistance: 6,
  wheelScaleStep: 1.1,
};

export const FORCE_LAYOUT = {
  iterationCap: 300,
  alphaMin: 0.001,
  velocityDecay: 0.4,
  chargeStrength: -120,
  linkDistance: 60,
  linkStrength: 0.6,
  centerStrength: 0.05,
  randomSeed: 137,
};
