// ============================================================================
// Stateful RNG (seedable, reproducible within a session)
// ============================================================================

export type Rng = {
  state: number;
};

export function createRng(seed: number): Rng {
  return { state: seed >>> 0 };
}

export function rngNextFloat(rng: Rng): number {
  // mulberry32 step, but with explicit state.
  rng.state = (rng.state + 0x6d2b79f5) >>> 0;
  let t = Math.imul(rng.state ^ (rng.state >>> 15), 1 | rng.state);
  t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
  return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
}

export function rngRange(rng: Rng, min: number, max: number): number {
  return min + (max - min) * rngNextFloat(rng);
}

export function rngChance(rng: Rng, probability: number): boolean {
  return rngNextFloat(rng) < probability;
}

export function rngPick<T>(rng: Rng, options: readonly T[]): T {
  if (options.length === 0) throw new Error("rngPick: no options");
  const idx = Math.min(options.length - 1, Math.floor(rngNextFloat(rng) * options.length));
  return options[idx];
}

// In-place Fisher–Yates.
export function rngShuffle<T>(rng: Rng, arr: T[]): T[] {
  for (let i = arr.length - 1; i > 0; i--) {
    const j = Math.floor(rngNextFloat(rng) * (i + 1));
    const tmp = arr[i];
    arr[i] = arr[j];
    arr[j] = tmp;
  }
  return arr;
}
