import { createAgent } from "@/flock/agent";
import type { AgentSpec } from "@/flock/agent";
import { resolveSimulationConfig } from "@/flock/vocabulary/schemas/config";
import type {
  SimulationConfig,
  SimulationConfigPatch,
} from "@/flock/vocabulary/schemas/config";
import type { Agent } from "@/flock/vocabulary/schemas/entities";
import { createSeededRNG } from "@/lib/seededRandom";
import type { DomainRNG } from "@/lib/seededRandom";

/**
 * Defaults with empty populations, so tests place every agent themselves
 */
export function makeConfig(patch: SimulationConfigPatch = {}): SimulationConfig {
  return resolveSimulationConfig({
    boidCount: 0,
    predatorCount: 0,
    obstacleCount: 0,
    leaderCount: 0,
    ...patch,
  });
}

export function makeRng(name = "test"): DomainRNG {
  return createSeededRNG("test-seed").domain(name);
}

/**
 * Agents with ids 1..n in the order given
 */
export function makeAgents(
  specs: AgentSpec[],
  config: SimulationConfig = makeConfig()
): Agent[] {
  return specs.map((spec, index) => createAgent(index + 1, spec, config));
}
