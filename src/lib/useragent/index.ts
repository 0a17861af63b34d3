/**
 * User Agent Module
 *
 * Provides:
 * - A closed set of desktop Chrome user agents
 * - Uniform selection with injectable (seedable) randomness
 */

export {
  UserAgentPool,
  createUserAgentPool,
  createSeededRandom,
  pickFrom,
  USER_AGENTS,
  type RandomSource,
} from './pool.js';
