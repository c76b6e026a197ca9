/**
 * Seeded pseudorandom generator.
 *
 * Each geometry call builds its own generator from an explicit seed, so
 * repeated evaluation (every rendered frame) yields identical output and no
 * state leaks between calls.
 */

export interface Rng {
  /** Uniform in [0, 1) */
  next(): number;
  /** Uniform in [low, high) */
  uniform(low: number, high: number): number;
  /** Standard normal */
  normal(): number;
  /** Gamma(shape, 1) */
  gamma(shape: number): number;
  /** One draw from Dirichlet(alpha); entries are non-negative and sum to 1 */
  dirichlet(alpha: readonly number[]): number[];
}

const mulberry32 = (seed: number) => {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = t;
    r = Math.imul(r ^ (r >>> 15), r | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

export function createRng(seed: number): Rng {
  const next = mulberry32(seed);

  const normal = (): number => {
    // Box-Muller; 1 - u keeps the log argument in (0, 1]
    const u1 = 1 - next();
    const u2 = next();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  };

  // Marsaglia-Tsang; shapes below 1 are boosted by one and scaled back down
  const gamma = (shape: number): number => {
    if (!(shape > 0)) {
      throw new RangeError(`Gamma shape must be positive, got ${shape}`);
    }
    if (shape < 1) {
      return gamma(shape + 1) * Math.pow(1 - next(), 1 / shape);
    }
    const d = shape - 1 / 3;
    const c = 1 / Math.sqrt(9 * d);
    for (;;) {
      let x: number;
      let v: number;
      do {
        x = normal();
        v = 1 + c * x;
      } while (v <= 0);
      v = v * v * v;
      const u = 1 - next();
      if (u < 1 - 0.0331 * x * x * x * x) return d * v;
      if (Math.log(u) < 0.5 * x * x + d * (1 - v + Math.log(v))) return d * v;
    }
  };

  return {
    next,
    uniform: (low, high) => low + (high - low) * next(),
    normal,
    gamma,
    dirichlet(alpha) {
      const draws = alpha.map((a) => gamma(a));
      const total = draws.reduce((sum, g) => sum + g, 0);
      return draws.map((g) => g / total);
    },
  };
}
