import type Network from '../architecture/network';

/**
 * A learning rule that adjusts a network's weights and biases from one labelled example.
 */
export interface TrainingAlgorithm {
  /**
   * Run a forward pass on `inputValues`, then update the network towards
   * `expectedOutputValues`, with the error signal scaled by `reward`.
   */
  train(
    network: Network,
    inputValues: readonly number[],
    reward: number,
    expectedOutputValues: readonly number[]
  ): void;
}
