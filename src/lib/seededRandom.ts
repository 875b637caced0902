/**
 * Seeded random numbers
 *
 * One master seed fans out into named domains ("spawning", "reconfigure",
 * ...). Each domain draws from its own stream, so adding draws in one
 * domain never shifts the values another domain sees.
 *
 * @example
 * const rng = createSeededRNG("flock-42");
 * const spawning = rng.domain("spawning");
 * spawning.range(0, 1200); // same value on every run with this seed
 */

/**
 * cyrb53 string hash, used to turn seeds and domain names into numbers
 */
function hashString(str: string): number {
  let h1 = 0xdeadbeef;
  let h2 = 0x41c6ce57;

  for (let i = 0; i < str.length; i++) {
    const ch = str.charCodeAt(i);
    h1 = Math.imul(h1 ^ ch, 2654435761);
    h2 = Math.imul(h2 ^ ch, 1597334677);
  }

  h1 = Math.imul(h1 ^ (h1 >>> 16), 2246822507);
  h1 ^= Math.imul(h2 ^ (h2 >>> 13), 3266489909);
  h2 = Math.imul(h2 ^ (h2 >>> 16), 2246822507);
  h2 ^= Math.imul(h1 ^ (h1 >>> 13), 3266489909);

  return 4294967296 * (2097151 & h2) + (h1 >>> 0);
}

/**
 * Mulberry32 - values in [0, 1)
 */
function createPRNG(seed: number): () => number {
  let state = seed;

  return function next(): number {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface DomainRNG {
  /** Next value in [0, 1) */
  next(): number;

  /** Value in [min, max) */
  range(min: number, max: number): number;

  /** Integer in [min, max) */
  intRange(min: number, max: number): number;

  /** Unit vector with a uniformly random heading */
  direction(): { x: number; y: number };
}

function createDomainRNG(seed: number): DomainRNG {
  const prng = createPRNG(seed);

  return {
    next: () => prng(),

    range: (min, max) => min + prng() * (max - min),

    intRange: (min, max) => Math.floor(min + prng() * (max - min)),

    direction: () => {
      const angle = prng() * Math.PI * 2;
      return { x: Math.cos(angle), y: Math.sin(angle) };
    },
  };
}

export interface SeededRNG {
  getMasterSeed(): string;

  /** Get or create the stream for a domain */
  domain(name: string): DomainRNG;

  getDomains(): string[];
}

export function createSeededRNG(masterSeed: string | number): SeededRNG {
  const masterSeedStr = String(masterSeed);
  const domains = new Map<string, DomainRNG>();

  return {
    getMasterSeed: () => masterSeedStr,

    domain: (name) => {
      const existing = domains.get(name);
      if (existing) return existing;
      // Domain seed: hash of "masterSeed:domainName"
      const created = createDomainRNG(hashString(`${masterSeedStr}:${name}`));
      domains.set(name, created);
      return created;
    },

    getDomains: () => Array.from(domains.keys()),
  };
}
