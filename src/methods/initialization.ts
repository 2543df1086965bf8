import seedrandom from 'seedrandom';

/** Source of uniformly distributed numbers in [0, 1). */
export type RandomSource = () => number;

/**
 * Produces the initial weight of a connection from the sizes of the two layers it joins.
 *
 * Every strategy owns its random source: two instances built from the same seed replay
 * the same sequence, independently of any other strategy in the process.
 */
export interface WeightInitializationStrategy {
  /**
   * @param fanIn Number of nodes in the source layer.
   * @param fanOut Number of nodes in the target layer.
   */
  initialWeight(fanIn: number, fanOut: number): number;
}

/**
 * Build a deterministic random source from a seed (ARC4 based, via `seedrandom`).
 *
 * @example
 * const a = seededRandom(42);
 * const b = seededRandom(42);
 * a() === b(); // true
 */
export function seededRandom(seed: number | string): RandomSource {
  const prng = seedrandom(String(seed));
  return () => prng();
}

/**
 * Narrow uniform initialization around 0.5: every weight lies in [0.49, 0.51).
 * Ignores the layer sizes. Mostly useful for reproducible toy setups.
 */
export class FixedRandomInitialization implements WeightInitializationStrategy {
  /** Shared instance backed by the process-wide `Math.random`. */
  static readonly default = new FixedRandomInitialization();

  constructor(private readonly random: RandomSource = Math.random) {}

  /** Strategy with its own generator seeded by `seed`. */
  static seeded(seed: number | string): FixedRandomInitialization {
    return new FixedRandomInitialization(seededRandom(seed));
  }

  initialWeight(_fanIn: number, _fanOut: number): number {
    return 0.49 + this.random() * 0.02;
  }
}

/**
 * Xavier / Glorot normal initialization: weights ~ N(0, 2 / (fanIn + fanOut)).
 *
 * Normal samples come from the Box–Muller transform over two uniforms taken from
 * (0, 1] so the logarithm never sees zero.
 *
 * @see {@link http://proceedings.mlr.press/v9/glorot10a.html Understanding the difficulty of training deep feedforward neural networks}
 */
export class XavierNormalInitialization implements WeightInitializationStrategy {
  /** Shared instance backed by the process-wide `Math.random`; the builder default. */
  static readonly default = new XavierNormalInitialization();

  constructor(private readonly random: RandomSource = Math.random) {}

  /** Strategy with its own generator seeded by `seed`. */
  static seeded(seed: number | string): XavierNormalInitialization {
    return new XavierNormalInitialization(seededRandom(seed));
  }

  initialWeight(fanIn: number, fanOut: number): number {
    const stdDev = Math.sqrt(2 / (fanIn + fanOut));
    const u1 = 1 - this.random();
    const u2 = 1 - this.random();
    const standardNormal =
      Math.sqrt(-2 * Math.log(u1)) * Math.sin(2 * Math.PI * u2);
    return standardNormal * stdDev;
  }
}

/**
 * Xavier / Glorot uniform initialization: weights ~ U(-L, L) with
 * `L = sqrt(6 / (fanIn + fanOut))`.
 */
export class XavierUniformInitialization implements WeightInitializationStrategy {
  static readonly default = new XavierUniformInitialization();

  constructor(private readonly random: RandomSource = Math.random) {}

  static seeded(seed: number | string): XavierUniformInitialization {
    return new XavierUniformInitialization(seededRandom(seed));
  }

  initialWeight(fanIn: number, fanOut: number): number {
    const limit = Math.sqrt(6 / (fanIn + fanOut));
    return this.random() * 2 * limit - limit;
  }
}
