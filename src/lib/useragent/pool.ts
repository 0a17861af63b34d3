/**
 * User Agent Pool
 *
 * A small closed set of desktop Chrome identities. One is picked per session
 * so pages that sniff the user agent render their regular desktop layout
 * instead of a "headless browser" variant.
 */

// ============================================================================
// Types
// ============================================================================

/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

export const USER_AGENTS: readonly string[] = [
  // Chrome on Windows
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36',
  // Chrome on Mac
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36',
];

// ============================================================================
// Randomness
// ============================================================================

/**
 * Deterministic generator (mulberry32) for reproducible picks in tests
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Uniform pick from a non-empty set
 */
export function pickFrom<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty set');
  }
  // clamp: injected sources may return 1
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}

// ============================================================================
// Pool
// ============================================================================

export class UserAgentPool {
  private agents: readonly string[];
  private random: RandomSource;

  constructor(agents: readonly string[] = USER_AGENTS, random: RandomSource = Math.random) {
    if (agents.length === 0) {
      throw new RangeError('UserAgentPool needs at least one user agent');
    }
    this.agents = agents;
    this.random = random;
  }

  pick(): string {
    return pickFrom(this.agents, this.random);
  }

  get size(): number {
    return this.agents.length;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createUserAgentPool(options: { seed?: number; agents?: readonly string[] } = {}): UserAgentPool {
  const random = options.seed === undefined ? Math.random : createSeededRandom(options.seed);
  return new UserAgentPool(options.agents ?? USER_AGENTS, random);
}
