import type Network from '../network';
import { ShapeMismatchError } from '../../utils/errors';

/**
 * Network activation helpers (forward pass).
 *
 * The forward pass is a synchronous traversal of a static layered graph:
 *  1. Input nodes receive the caller's values unchanged.
 *  2. Each hidden layer, nearest the inputs first, computes its activations from the
 *     layer before it.
 *  3. The output layer computes its activations from the last hidden layer (or directly
 *     from the inputs when there is none).
 *
 * Because every layer only reads the layer before it, a single ordered sweep is enough;
 * no topological sort is needed.
 *
 * @module network.activate
 */

/**
 * Assign input values and propagate them forward.
 *
 * @param this - Bound {@link Network} instance.
 * @param input - One value per input node.
 * @throws {ShapeMismatchError} If `input.length` differs from the number of input nodes.
 * @example
 * net.fire([0, 1]);
 * net.outputs[0].activation; // => e.g. 0.73
 */
export function fire(this: Network, input: readonly number[]): void {
  if (input.length !== this.inputs.length) {
    throw new ShapeMismatchError('Input', this.inputs.length, input.length);
  }
  for (let i = 0; i < input.length; i++) {
    this.inputs[i].activate(input[i]);
  }
  this.feedForward();
}

/**
 * Recompute every hidden and output activation from the current input activations.
 *
 * @param this - Bound {@link Network} instance.
 */
export function feedForward(this: Network): void {
  for (const layer of this.hiddenLayers) {
    for (const node of layer) node.activate();
  }
  for (const node of this.outputs) node.activate();
}

/**
 * Fire the network and return a detached copy of the output activations.
 *
 * @param this - Bound {@link Network} instance.
 * @param input - One value per input node.
 * @returns Output activations in output-node order.
 * @throws {ShapeMismatchError} If `input.length` differs from the number of input nodes.
 */
export function activate(this: Network, input: readonly number[]): number[] {
  this.fire(input);
  return this.outputValues();
}
