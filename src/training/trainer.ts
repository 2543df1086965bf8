import type Network from '../architecture/network';
import type TrainingData from './trainingData';
import type { TrainingAlgorithm } from './trainingAlgorithm';
import { warn } from '../utils/warnings';

/**
 * Completion test for {@link Trainer.trainUntil}, evaluated after every training step.
 *
 * @param network The network being trained.
 * @param iteration Number of training steps performed so far (1 on the first call).
 */
export type CompletionPredicate = (network: Network, iteration: number) => boolean;

/** Terminal and running states of a predicate-driven training run. */
export type TrainUntilState = 'training' | 'converged' | 'exhausted';

/**
 * Drives a {@link TrainingAlgorithm} over labelled examples until an error tolerance, a
 * caller predicate or an iteration budget ends the run.
 *
 * Examples are stored under caller-chosen keys; the whole-set `retrain` visits them in
 * insertion order, so a run is reproducible for a given algorithm and initial network.
 *
 * The error of one step is the largest absolute difference between an output activation
 * and its target, measured on the forward pass of that step.
 *
 * @typeParam TKey Identifier type of the stored examples.
 */
export default class Trainer<TKey = string> {
  /** Number of training steps performed by the most recent train / retrain / trainUntil call. */
  lastIterations = 0;

  private readonly algorithm: TrainingAlgorithm;
  private readonly data: Map<TKey, TrainingData>;

  /**
   * @param algorithm Learning rule applied at every step.
   * @param data Initial examples, as a map or `[key, example]` pairs (copied).
   * @example
   * const trainer = new Trainer(new Backpropagation({ learningRate: 0.2 }), [
   *   ['off', new TrainingData([0], [0])],
   *   ['on', new TrainingData([1], [1])],
   * ]);
   */
  constructor(
    algorithm: TrainingAlgorithm,
    data: Iterable<readonly [TKey, TrainingData]> = []
  ) {
    this.algorithm = algorithm;
    this.data = new Map<TKey, TrainingData>();
    for (const [key, example] of data) this.data.set(key, example);
  }

  /** Stored examples in insertion order. */
  get trainingData(): TrainingData[] {
    return [...this.data.values()];
  }

  /** Number of stored examples. */
  get size(): number {
    return this.data.size;
  }

  /** Store `example` under `key`, replacing (in place) any example already stored there. */
  addOrUpdateData(key: TKey, example: TrainingData): void {
    this.data.set(key, example);
  }

  /** Example stored under `key`, if any. */
  getData(key: TKey): TrainingData | undefined {
    return this.data.get(key);
  }

  /** Remove the example stored under `key`. Returns whether one was removed. */
  removeData(key: TKey): boolean {
    return this.data.delete(key);
  }

  /**
   * Train on a single example until its error is within `tolerance`.
   *
   * @returns true if the tolerance was reached within `maxIterations` steps.
   */
  train(
    network: Network,
    tolerance: number,
    maxIterations: number,
    example: TrainingData
  ): boolean {
    this.lastIterations = 0;
    for (let i = 0; i < maxIterations; i++) {
      const error = this.step(network, example);
      this.lastIterations++;
      if (error <= tolerance) return true;
    }
    warn(
      `train: tolerance ${tolerance} not reached after ${this.lastIterations} iterations`
    );
    return false;
  }

  /**
   * Train on every stored example, in insertion order, sweep after sweep, until the worst
   * error of a sweep is within `tolerance`.
   *
   * `maxIterations` is shared by all examples: once it is used up the current sweep stops,
   * even part way through the set.
   *
   * @returns true if the last (possibly partial) sweep's worst error is within `tolerance`.
   *   An empty trainer returns true without training.
   */
  retrain(network: Network, tolerance: number, maxIterations: number): boolean {
    this.lastIterations = 0;
    if (this.data.size === 0) {
      warn('retrain: no training data stored, nothing to do');
      return true;
    }
    if (maxIterations <= 0) return false;

    let worstError: number;
    do {
      worstError = 0;
      for (const example of this.data.values()) {
        if (this.lastIterations >= maxIterations) break;
        worstError = Math.max(worstError, this.step(network, example));
        this.lastIterations++;
      }
    } while (this.lastIterations < maxIterations && !(worstError <= tolerance));

    const converged = worstError <= tolerance;
    if (!converged) {
      warn(
        `retrain: tolerance ${tolerance} not reached after ${this.lastIterations} iterations (worst error ${worstError})`
      );
    }
    return converged;
  }

  /**
   * Train on a single example until `predicate` reports completion.
   *
   * The predicate is checked exactly once after every step, never before the first one:
   * a predicate that is already satisfied still costs one training step.
   *
   * @returns true if the run ended because the predicate returned true, false if
   *   `maxIterations` steps were exhausted first.
   */
  trainUntil(
    network: Network,
    maxIterations: number,
    example: TrainingData,
    predicate: CompletionPredicate
  ): boolean {
    this.lastIterations = 0;
    let state: TrainUntilState = 'training';
    while (state === 'training') {
      if (this.lastIterations >= maxIterations) {
        state = 'exhausted';
        break;
      }
      this.step(network, example);
      this.lastIterations++;
      if (predicate(network, this.lastIterations)) state = 'converged';
    }
    if (state === 'exhausted') {
      warn(`trainUntil: predicate not satisfied after ${this.lastIterations} iterations`);
    }
    return state === 'converged';
  }

  /** One training step; returns the largest absolute output error of its forward pass. */
  private step(network: Network, example: TrainingData): number {
    this.algorithm.train(network, example.inputs, example.reward ?? 1, example.outputs);
    return Trainer.maxOutputError(network, example.outputs);
  }

  /** Largest `|activation - target|` over the output layer. */
  static maxOutputError(network: Network, targets: readonly number[]): number {
    let max = 0;
    network.outputs.forEach((node, i) => {
      max = Math.max(max, Math.abs(node.activation - targets[i]));
    });
    return max;
  }
}
