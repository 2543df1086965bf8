/**
 * File: backpropagation.ts
 * ----------------------------------------------------
 * Stochastic gradient descent by error backpropagation for layered feed-forward networks.
 *
 * One call to {@link Backpropagation.backpropagate} performs, in order:
 *  1. Output gradients: `derivative(y) * (target - y) * reward`.
 *  2. Hidden gradients, output-adjacent layer first:
 *     `derivative(y) * Σ(out.to.gradient * out.weight)`.
 *  3. Effective learning rate from the rate policy (fixed or gradient-scaled).
 *  4. Weight updates over `network.connections`:
 *     `delta = rate * to.gradient * from.activation; weight += delta + momentum * previousDelta`.
 *  5. Bias updates, hidden nodes then output nodes:
 *     `delta = rate * gradient; bias += delta + momentum * previousDelta`.
 *
 * Momentum is classic (heavy ball): the stored delta of the previous step is read before
 * it is overwritten. No clamping is applied: NaN / Infinity propagate like any other value.
 */
import type Network from '../architecture/network';
import type Node from '../architecture/node';
import type Connection from '../architecture/connection';
import Rate, { type RatePolicy } from '../methods/rate';
import { config } from '../config';
import { ShapeMismatchError } from '../utils/errors';
import type { TrainingAlgorithm } from './trainingAlgorithm';

/** Construction options for {@link Backpropagation}. */
export interface BackpropagationOptions {
  /** Step size. Defaults to `config.defaultLearningRate`. */
  learningRate?: number;
  /** Fraction of the previous delta added to each update. Defaults to `config.defaultMomentum`. */
  momentum?: number;
  /**
   * Scale the learning rate with the magnitude of the output error signal
   * ({@link Rate.gradientScaled}). Default false (fixed rate).
   */
  useAdaptiveLearningRate?: boolean;
}

export default class Backpropagation implements TrainingAlgorithm {
  /** Base learning rate (eta). */
  learningRate: number;
  /** Momentum coefficient applied to the previous weight / bias deltas. */
  momentum: number;
  /** Whether the gradient-scaled rate policy is used instead of the fixed one. */
  useAdaptiveLearningRate: boolean;
  /** Learning rate actually applied by the most recent update step. */
  lastLearningRate: number;

  private readonly fixedRate: RatePolicy = Rate.fixed();
  private readonly adaptiveRate: RatePolicy = Rate.gradientScaled();

  /**
   * @example
   * const backprop = new Backpropagation({ learningRate: 0.2, momentum: 0.1 });
   * backprop.train(net, [0, 1], 1, [1]);
   */
  constructor(options: BackpropagationOptions = {}) {
    this.learningRate = options.learningRate ?? config.defaultLearningRate;
    this.momentum = options.momentum ?? config.defaultMomentum;
    this.useAdaptiveLearningRate = options.useAdaptiveLearningRate ?? false;
    this.lastLearningRate = this.learningRate;
  }

  /**
   * Forward pass followed by a full backward update.
   *
   * @throws {ShapeMismatchError} When the input or target vector does not match the network.
   */
  train(
    network: Network,
    inputValues: readonly number[],
    reward: number,
    expectedOutputValues: readonly number[]
  ): void {
    if (expectedOutputValues.length !== network.outputs.length) {
      throw new ShapeMismatchError(
        'Target',
        network.outputs.length,
        expectedOutputValues.length
      );
    }
    network.fire(inputValues);
    this.backpropagate(network, reward, expectedOutputValues);
  }

  /**
   * Backward pass and update only; the caller must have fired the network on the
   * example's inputs beforehand.
   *
   * @param reward Multiplier of the output error. 1 is plain backpropagation, 0 leaves the
   *   network unchanged, a negative value pushes the outputs away from the targets.
   * @throws {ShapeMismatchError} When `expectedOutputValues` does not match the output layer.
   */
  backpropagate(
    network: Network,
    reward: number,
    expectedOutputValues: readonly number[]
  ): void {
    if (expectedOutputValues.length !== network.outputs.length) {
      throw new ShapeMismatchError(
        'Target',
        network.outputs.length,
        expectedOutputValues.length
      );
    }

    this.updateOutputGradients(network, reward, expectedOutputValues);
    this.updateHiddenGradients(network);

    const rate = this.effectiveLearningRate(network);
    this.lastLearningRate = rate;

    for (const connection of network.connections) {
      this.updateWeight(connection, rate);
    }
    for (const layer of network.hiddenLayers) {
      for (const node of layer) this.updateBias(node, rate);
    }
    for (const node of network.outputs) this.updateBias(node, rate);
  }

  private updateOutputGradients(
    network: Network,
    reward: number,
    expectedOutputValues: readonly number[]
  ): void {
    network.outputs.forEach((node, o) => {
      node.gradient =
        node.derivative() * (expectedOutputValues[o] - node.activation) * reward;
    });
  }

  private updateHiddenGradients(network: Network): void {
    for (let l = network.hiddenLayers.length - 1; l >= 0; l--) {
      for (const node of network.hiddenLayers[l]) {
        let downstream = 0;
        for (const connection of node.connections.out ?? []) {
          downstream += connection.to.gradient * connection.weight;
        }
        node.gradient = node.derivative() * downstream;
      }
    }
  }

  /** Root mean square of the output gradients fed to the adaptive policy. */
  private effectiveLearningRate(network: Network): number {
    if (!this.useAdaptiveLearningRate) {
      return this.fixedRate(this.learningRate, 0);
    }
    let sumSq = 0;
    for (const node of network.outputs) sumSq += node.gradient * node.gradient;
    const rms = Math.sqrt(sumSq / network.outputs.length);
    return this.adaptiveRate(this.learningRate, rms);
  }

  private updateWeight(connection: Connection, rate: number): void {
    const delta = rate * connection.to.gradient * connection.from.activation;
    connection.weight += delta + this.momentum * connection.previousDeltaWeight;
    connection.previousDeltaWeight = delta;
  }

  private updateBias(node: Node, rate: number): void {
    const delta = rate * node.gradient;
    node.bias += delta + this.momentum * node.previousDeltaBias;
    node.previousDeltaBias = delta;
  }
}
