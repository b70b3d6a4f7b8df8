/**
 * Shared test helpers
 */

import { Orchestrator, type OrchestratorOptions } from '../src/orchestrator/orchestrator.js';
import { PhaseCatalog } from '../src/orchestrator/phases.js';

/**
 * Orchestrator with no retry delay and an optional phase catalog.
 */
export function createTestOrchestrator(
  phases: Record<string, string[]> = {},
  options: OrchestratorOptions = {}
): Orchestrator {
  return new Orchestrator({
    phases: new PhaseCatalog(phases),
    ...options,
    retry: { delayMs: 0, ...options.retry },
  });
}

/**
 * Handler that always throws the given message.
 */
export function failing(message = 'boom'): () => never {
  return () => {
    throw new Error(message);
  };
}

/**
 * Handler that fails `failures` times, then returns `result`.
 */
export function flaky<T>(failures: number, result: T): () => T {
  let calls = 0;
  return () => {
    calls++;
    if (calls <= failures) {
      throw new Error(`attempt ${calls} failed`);
    }
    return result;
  };
}

/**
 * Deterministic PRNG (mulberry32).
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
