/**
 * Injected randomness for synthetic loss generation. Nothing here reads Math.random:
 * callers pass a RandomSource, so a fixed seed reproduces the same sample.
 */

/** Uniform draw in [0, 1). */
export type RandomSource = () => number;

/** Seeded PRNG (mulberry32) for deterministic runs. Returns 0–1. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return function next() {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Standard normal draw (Box–Muller, cosine branch). */
export function sampleStandardNormal(random: RandomSource): number {
  // 1 - u keeps the log argument in (0, 1]
  const u1 = 1 - random();
  const u2 = random();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/**
 * Gamma(shape, scale) draw, Marsaglia–Tsang squeeze method.
 * For shape < 1 draws Gamma(shape + 1) and applies the U^(1/shape) boost.
 */
export function sampleGamma(shape: number, scale: number, random: RandomSource): number {
  if (!(shape > 0) || !(scale > 0)) {
    throw new RangeError(`Gamma: shape and scale must be positive (got shape=${shape}, scale=${scale}).`);
  }
  if (shape < 1) {
    const boost = Math.pow(1 - random(), 1 / shape);
    return sampleGamma(shape + 1, scale, random) * boost;
  }

  const d = shape - 1 / 3;
  const c = 1 / Math.sqrt(9 * d);
  for (;;) {
    const x = sampleStandardNormal(random);
    const base = 1 + c * x;
    if (base <= 0) continue;
    const v = base * base * base;
    const u = random();
    if (u < 1 - 0.0331 * x ** 4) return d * v * scale;
    if (Math.log(u) < 0.5 * x * x + d * (1 - v + Math.log(v))) return d * v * scale;
  }
}
