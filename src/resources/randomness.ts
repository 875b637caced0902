/**
 * Randomness Resource - seeded RNG for the whole system
 *
 * The master seed comes from the active config, so two systems started
 * with the same config spawn identical populations.
 *
 * Domains:
 * - spawning: initial population and reconfiguration growth
 *
 * @example
 * const spawning = randomness.domain("spawning");
 * const x = spawning.range(arena.minX, arena.maxX);
 */

import { defineResource } from "braided";
import { createSeededRNG, type DomainRNG } from "@/lib/seededRandom";
import type { ConfigResource } from "./config";

export interface RandomnessResource {
  getMasterSeed(): string;

  domain(name: string): DomainRNG;

  getDomains(): string[];
}

export const randomness = defineResource({
  dependencies: ["config"],
  start: ({ config }: { config: ConfigResource }): RandomnessResource => {
    const seed = config.getConfig().seed;
    const rng = createSeededRNG(seed);

    console.log(`[randomness] Initialized with seed: "${seed}"`);

    return {
      getMasterSeed: () => rng.getMasterSeed(),
      domain: (name) => rng.domain(name),
      getDomains: () => rng.getDomains(),
    };
  },
  halt: (resource) => {
    console.log(`[randomness] Halted (seed "${resource.getMasterSeed()}")`);
  },
});
