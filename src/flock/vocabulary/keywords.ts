/**
 * Vocabulary - Single Source of Truth for agent kinds, behaviors, events and effects
 *
 * Every string literal that crosses a module boundary is declared here once
 * and referenced through these objects, so schemas, handlers and tests agree.
 */

// ============================================
// Agent Keywords
// ============================================

export const agentKindKeywords = {
  boid: "boid",
  predator: "predator",
  obstacle: "obstacle",
  leader: "leader",
} as const;

// ============================================
// Behavior Keywords
// ============================================

/**
 * Steering terms, listed in the order they claim the force budget.
 */
export const behaviorKeywords = {
  predatorEvasion: "predatorEvasion",
  obstacleAvoidance: "obstacleAvoidance",
  boundary: "boundary",
  separation: "separation",
  predation: "predation",
  leaderInfluence: "leaderInfluence",
  alignment: "alignment",
  cohesion: "cohesion",
} as const;

// ============================================
// Simulation Status Keywords
// ============================================

export const statusKeywords = {
  idle: "idle",
  running: "running",
  paused: "paused",
  stopped: "stopped",
} as const;

// ============================================
// Event Keywords
// ============================================

export const eventKeywords = {
  controls: {
    paused: "controls/paused",
    resumed: "controls/resumed",
    speedMultiplierChanged: "controls/speedMultiplierChanged",
    speedStepped: "controls/speedStepped",
    gridVisualizationToggled: "controls/gridVisualizationToggled",
    reconfigured: "controls/reconfigured",
  },
  simulation: {
    stopped: "simulation/stopped",
  },
} as const;

// ============================================
// Effect Keywords
// ============================================

export const effectKeywords = {
  config: {
    update: "config:update",
  },
  engine: {
    stage: "engine:stage",
    stop: "engine:stop",
  },
  log: {
    warn: "log:warn",
  },
} as const;

// ============================================
// Staged Command Keywords
// ============================================

/**
 * Commands the engine applies at the next frame boundary.
 */
export const commandKeywords = {
  pause: "pause",
  resume: "resume",
  setSpeedMultiplier: "setSpeedMultiplier",
  setGridVisualization: "setGridVisualization",
  reconfigure: "reconfigure",
} as const;

// ============================================
// Auto-test Keywords
// ============================================

export const scenarioKeywords = {
  flocking: "flocking",
  predatorPrey: "predatorPrey",
  obstacles: "obstacles",
} as const;
