import * as vec from "./vector";
import * as rules from "./rules";
import { agentKindKeywords, behaviorKeywords } from "./vocabulary/keywords";
import type { AgentView } from "./vocabulary/schemas/entities";
import type { SimulationConfig } from "./vocabulary/schemas/config";
import type { Behavior, Vector2 } from "./vocabulary/schemas/primitives";

/**
 * Force Model - turns an agent's neighborhood into one steering force
 *
 * Terms are weighted, then claim the maxForce budget in priority order:
 * whatever a higher-priority term uses is no longer available to the
 * terms after it.
 */

export type SteeringTerm = {
  behavior: Behavior;
  force: Vector2;
};

export type SteeringResult = {
  force: Vector2;
  fired: Behavior[]; // Behaviors that produced a term, in priority order
};

const priority: readonly Behavior[] = [
  behaviorKeywords.predatorEvasion,
  behaviorKeywords.obstacleAvoidance,
  behaviorKeywords.boundary,
  behaviorKeywords.separation,
  behaviorKeywords.predation,
  behaviorKeywords.leaderInfluence,
  behaviorKeywords.alignment,
  behaviorKeywords.cohesion,
];

/**
 * Raw (weighted) terms for one agent, unordered
 */
export function collectSteeringTerms(
  agent: AgentView,
  neighbors: readonly AgentView[],
  config: SimulationConfig
): SteeringTerm[] {
  const { weights } = config;
  const terms: SteeringTerm[] = [];

  const push = (behavior: Behavior, term: Vector2 | null, weight: number) => {
    if (term) terms.push({ behavior, force: vec.multiply(term, weight) });
  };

  const containment = () =>
    push(
      behaviorKeywords.boundary,
      rules.containWithinArena(agent, config.arena, config.boundaryMargin),
      weights.boundary
    );

  switch (agent.kind) {
    case agentKindKeywords.obstacle:
      return terms;

    case agentKindKeywords.predator:
      push(
        behaviorKeywords.obstacleAvoidance,
        rules.avoidObstacles(agent, neighbors, config),
        weights.obstacleAvoidance
      );
      containment();
      push(
        behaviorKeywords.separation,
        rules.separation(agent, neighbors, config),
        weights.separation
      );
      push(
        behaviorKeywords.predation,
        rules.pursuePrey(agent, neighbors, config),
        weights.predation
      );
      return terms;

    case agentKindKeywords.boid:
    case agentKindKeywords.leader: {
      const isLeader = agent.kind === agentKindKeywords.leader;
      push(
        behaviorKeywords.predatorEvasion,
        rules.evadePredators(agent, neighbors, config),
        weights.predatorEvasion
      );
      push(
        behaviorKeywords.obstacleAvoidance,
        rules.avoidObstacles(agent, neighbors, config),
        weights.obstacleAvoidance
      );
      containment();
      push(
        behaviorKeywords.separation,
        rules.separation(agent, neighbors, config),
        weights.separation
      );
      if (!isLeader) {
        push(
          behaviorKeywords.leaderInfluence,
          rules.followLeaders(agent, neighbors, config),
          weights.leaderInfluence
        );
      }
      push(
        behaviorKeywords.alignment,
        rules.alignment(agent, neighbors, config),
        weights.alignment
      );
      push(
        behaviorKeywords.cohesion,
        rules.cohesion(agent, neighbors, config),
        isLeader
          ? weights.cohesion * config.leaderCohesionBoost
          : weights.cohesion
      );
      return terms;
    }
  }
}

/**
 * Add terms in priority order until the force budget is spent. A term
 * larger than what remains is shortened to fit.
 */
export function accumulateWithinBudget(
  terms: readonly SteeringTerm[],
  budget: number
): Vector2 {
  const ordered = [...terms].sort(
    (a, b) => priority.indexOf(a.behavior) - priority.indexOf(b.behavior)
  );

  let total: Vector2 = { x: 0, y: 0 };
  for (const term of ordered) {
    const remaining = budget - vec.magnitude(total);
    if (remaining <= 0) break;
    const size = vec.magnitude(term.force);
    total = vec.add(
      total,
      size > remaining ? vec.setMagnitude(term.force, remaining) : term.force
    );
  }

  return vec.limit(total, budget);
}

export function computeSteering(
  agent: AgentView,
  neighbors: readonly AgentView[],
  config: SimulationConfig
): SteeringResult {
  const terms = collectSteeringTerms(agent, neighbors, config);
  const force = accumulateWithinBudget(terms, agent.maxForce);
  const fired = priority.filter((behavior) =>
    terms.some((term) => term.behavior === behavior)
  );
  return { force, fired };
}
