/**
 * Seeded pseudo-random source with explicit state.
 *
 * Every draw takes a Seed and returns the value together with the next Seed,
 * so replaying the same seed and the same sequence of draws reproduces the
 * same values. The step function is mulberry32.
 */

/**
 * Generator state. Treat as opaque; create with `initialSeed`.
 */
export interface Seed {
  readonly state: number;
}

/**
 * A drawn value paired with the state to use for the next draw.
 */
export type Draw<T> = readonly [T, Seed];

/**
 * Create generator state from any integer. Fractional or non-finite input is
 * truncated to a 32-bit integer first.
 */
export function initialSeed(value: number): Seed {
  const state = Number.isFinite(value) ? Math.trunc(value) | 0 : 0;
  return Object.freeze({ state });
}

/**
 * Next 32-bit unsigned integer.
 */
export function nextUint32(seed: Seed): Draw<number> {
  const state = (seed.state + 0x6d2b79f5) | 0;
  let t = Math.imul(state ^ (state >>> 15), 1 | state);
  t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
  return [(t ^ (t >>> 14)) >>> 0, Object.freeze({ state })];
}

/**
 * Uniform float in [0, 1).
 */
export function nextFloat(seed: Seed): Draw<number> {
  const [value, next] = nextUint32(seed);
  return [value / 4294967296, next];
}

/**
 * Uniform float in [min, max).
 */
export function float(min: number, max: number, seed: Seed): Draw<number> {
  const [value, next] = nextFloat(seed);
  return [min + value * (max - min), next];
}

/**
 * Uniform integer in [min, max] (both inclusive).
 */
export function int(min: number, max: number, seed: Seed): Draw<number> {
  const [value, next] = nextFloat(seed);
  return [min + Math.floor(value * (max - min + 1)), next];
}

/**
 * True with the given probability.
 */
export function chance(probability: number, seed: Seed): Draw<boolean> {
  const [value, next] = nextFloat(seed);
  return [value < probability, next];
}

/**
 * Draw an integer suitable for seeding an independent generator.
 */
export function independentSeed(seed: Seed): Draw<number> {
  const [value, next] = nextUint32(seed);
  return [value | 0, next];
}
