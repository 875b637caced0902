import { copyAgent, createAgent } from "../agent";
import type { AgentSpec } from "../agent";
import { ConfigurationError, SimulationStateError } from "../errors";
import { createEmptyFrameMetrics } from "../metrics";
import type { FrameMetrics } from "../metrics";
import { adjustPopulation, spawnPopulation } from "../spawning";
import {
  createSpatialHash,
  getOccupiedCells,
  rebuildSpatialHash,
} from "../spatialHash";
import { commandKeywords, statusKeywords } from "../vocabulary/keywords";
import { stagedCommandSchema } from "../vocabulary/schemas/commands";
import type { StagedCommand } from "../vocabulary/schemas/commands";
import type { Agent, AgentView } from "../vocabulary/schemas/entities";
import { parseSimulationConfig } from "../vocabulary/schemas/config";
import type { SimulationConfig } from "../vocabulary/schemas/config";
import type { SimulationStatus } from "../vocabulary/schemas/primitives";
import type { GridOccupancy } from "../vocabulary/schemas/state";
import { runFrame } from "./core";
import { nextStatus } from "./lifecycle";
import type { LifecycleTransition } from "./lifecycle";
import type { DomainRNG } from "@/lib/seededRandom";
import { createSubscription } from "@/lib/state";

export type FrameSnapshot = {
  frame: number;
  status: SimulationStatus;
  simulatedTimeMs: number;
  agents: Agent[];
  metrics: FrameMetrics;
  grid: GridOccupancy | null;
};

export type FrameListener = (snapshot: FrameSnapshot) => void;

export type FlockEngineOptions = {
  config: SimulationConfig;
  rng: DomainRNG; // Spawning stream (initial population and reconfiguration)
  agents?: AgentSpec[]; // Explicit population instead of the config counts
  now?: () => number;
};

export type FlockEngine = ReturnType<typeof createFlockEngine>;

/**
 * Create a simulation stepper.
 *
 * The engine owns its agents and grid. Controls other than start/stop are
 * staged and take effect at the start of the next step() call. Throws
 * ConfigurationError for an invalid config before anything is built.
 */
export function createFlockEngine(options: FlockEngineOptions) {
  const now = options.now ?? (() => performance.now());
  const rng = options.rng;

  let config = parseSimulationConfig(options.config);
  let status: SimulationStatus = statusKeywords.idle;
  let hash = createSpatialHash(config.gridCellSize);
  let frame = 0;
  let simulatedTimeMs = 0;
  let lastMetrics = createEmptyFrameMetrics();
  let inFrame = false;
  let staged: StagedCommand[] = [];

  let lastId = 0;
  const nextId = () => ++lastId;

  let agents: Agent[] = options.agents
    ? options.agents.map((spec) => createAgent(nextId(), spec, config))
    : spawnPopulation(config, rng, nextId);

  const frames = createSubscription<FrameSnapshot>();

  const transition = (to: LifecycleTransition): boolean => {
    const next = nextStatus(status, to);
    if (next === null) return false;
    status = next;
    return true;
  };

  const buildGridOccupancy = (): GridOccupancy | null => {
    if (!config.visualizeGrid) return null;
    rebuildSpatialHash(hash, agents);
    return { cellSize: hash.cellSize, cells: getOccupiedCells(hash) };
  };

  const buildSnapshot = (): FrameSnapshot => ({
    frame,
    status,
    simulatedTimeMs,
    agents: agents.map(copyAgent),
    metrics: {
      ...lastMetrics,
      behaviors: { ...lastMetrics.behaviors },
    },
    grid: buildGridOccupancy(),
  });

  const applyCommand = (command: StagedCommand) => {
    switch (command.type) {
      case commandKeywords.pause:
      case commandKeywords.resume:
        if (!transition(command.type)) {
          console.warn(`[engine] Ignoring ${command.type} while ${status}`);
        }
        return;
      case commandKeywords.setSpeedMultiplier:
        config = { ...config, speedMultiplier: command.value };
        return;
      case commandKeywords.setGridVisualization:
        config = { ...config, visualizeGrid: command.enabled };
        return;
      case commandKeywords.reconfigure:
        config = command.config;
        hash = createSpatialHash(config.gridCellSize);
        agents = adjustPopulation(agents, config, rng, nextId);
        return;
    }
  };

  const flushStaged = () => {
    const pending = staged;
    staged = [];
    for (const command of pending) {
      applyCommand(command);
    }
  };

  const assertBetweenFrames = (operation: string) => {
    if (inFrame) {
      throw new SimulationStateError(
        `Cannot ${operation} while a frame is in progress`
      );
    }
  };

  return {
    getStatus: (): SimulationStatus => status,
    getConfig: (): SimulationConfig => config,
    getFrame: () => frame,
    getAgents: (): readonly AgentView[] => agents,
    getPendingCommands: (): readonly StagedCommand[] => staged,

    start: () => {
      if (!transition("start")) {
        throw new SimulationStateError(
          `Cannot start an engine that is ${status}`
        );
      }
    },

    /**
     * Stop immediately. Pending commands are dropped; stopping twice is a
     * no-op.
     */
    stop: () => {
      if (status === statusKeywords.stopped) return;
      transition("stop");
      staged = [];
    },

    /**
     * Queue a control command for the next frame boundary
     */
    stage: (command: StagedCommand) => {
      const parsed = stagedCommandSchema.safeParse(command);
      if (!parsed.success) {
        throw new ConfigurationError(
          `Invalid ${command.type} command`,
          parsed.error.issues.map((issue) => issue.message)
        );
      }
      if (status === statusKeywords.stopped) {
        console.warn(`[engine] Ignoring ${command.type}: engine is stopped`);
        return;
      }
      staged.push(parsed.data);
    },

    /**
     * Advance one frame of dt nominal frames (scaled by the speed
     * multiplier). Staged commands apply first; only a running engine
     * moves. Returns the snapshot after the frame.
     */
    step: (dt = 1): FrameSnapshot => {
      assertBetweenFrames("step");
      if (!(dt >= 0) || !Number.isFinite(dt)) {
        throw new RangeError(
          `dt must be a finite non-negative number, got ${dt}`
        );
      }
      if (status === statusKeywords.stopped) {
        return buildSnapshot();
      }

      flushStaged();
      if (status !== statusKeywords.running) {
        return buildSnapshot();
      }

      inFrame = true;
      try {
        const effectiveDt = dt * config.speedMultiplier;
        lastMetrics = runFrame({
          agents,
          hash,
          config,
          dt: effectiveDt,
          frame: frame + 1,
          now,
        });
        frame++;
        simulatedTimeMs += (effectiveDt * 1000) / config.fpsTarget;
      } finally {
        inFrame = false;
      }

      const snapshot = buildSnapshot();
      frames.notify(snapshot);
      return snapshot;
    },

    snapshot: (): FrameSnapshot => {
      assertBetweenFrames("take a snapshot");
      return buildSnapshot();
    },

    subscribe: (listener: FrameListener) => frames.subscribe(listener),

    /**
     * Add an agent between frames. Returns the created agent's copy.
     */
    addAgent: (spec: AgentSpec): Agent => {
      assertBetweenFrames("add an agent");
      const agent = createAgent(nextId(), spec, config);
      agents.push(agent);
      return copyAgent(agent);
    },

    removeAgent: (id: number): boolean => {
      assertBetweenFrames("remove an agent");
      const before = agents.length;
      agents = agents.filter((agent) => agent.id !== id);
      return agents.length < before;
    },
  };
}
