import Node, { type NodeType } from './node';
import Connection from './connection';
import Network from './network';
import { Activation, type ActivationFunction } from '../methods/activation';
import {
  XavierNormalInitialization,
  type WeightInitializationStrategy,
} from '../methods/initialization';

/**
 * Builds layered feed-forward networks.
 *
 * `Architect.build` allocates the nodes of every layer, fully connects each layer to the
 * next one and draws the initial weights from a {@link WeightInitializationStrategy}.
 */
export default class Architect {
  /**
   * Construct a fully connected multilayer perceptron.
   *
   * Weights are drawn in connection traversal order (source layer by layer, node by node,
   * then target node order), with `fanIn` the size of the source layer and `fanOut` the
   * size of the target layer. Every node starts with `config.initialBias`.
   *
   * @param inputCount Number of input nodes.
   * @param outputCount Number of output nodes.
   * @param hiddenLayerCounts Size of each hidden layer, nearest the inputs first. May be
   *   empty, in which case inputs are wired directly to outputs.
   * @param activation Activation of input and hidden nodes. Defaults to tanh.
   * @param outputActivation Activation of output nodes. Defaults to logistic.
   * @param weightInitialization Defaults to the shared Xavier normal strategy.
   * @throws {Error} If any layer size is not a positive integer.
   * @example
   * // 2 inputs, one hidden layer of 3, 1 output
   * const net = Architect.build(2, 1, [3]);
   */
  static build(
    inputCount: number,
    outputCount: number,
    hiddenLayerCounts: readonly number[] = [],
    activation: ActivationFunction = Activation.tanh,
    outputActivation: ActivationFunction = Activation.logistic,
    weightInitialization: WeightInitializationStrategy = XavierNormalInitialization.default
  ): Network {
    Architect.assertLayerSize('input', inputCount);
    Architect.assertLayerSize('output', outputCount);
    hiddenLayerCounts.forEach((count, i) =>
      Architect.assertLayerSize(`hidden layer ${i}`, count)
    );

    const inputs = Architect.createNodes('input', inputCount, activation);

    const hiddenLayers: Node[][] = [];
    let previousLayer = inputs;
    for (const count of hiddenLayerCounts) {
      const layer = Architect.createNodes('hidden', count, activation);
      Architect.connectLayers(previousLayer, layer, weightInitialization);
      hiddenLayers.push(layer);
      previousLayer = layer;
    }

    const outputs = Architect.createNodes('output', outputCount, outputActivation);
    Architect.connectLayers(previousLayer, outputs, weightInitialization);

    return new Network(inputs, hiddenLayers, outputs);
  }

  /**
   * Fully connect `from` to `to`. Connection `k` of each target's incoming array always
   * originates from node `k` of the source layer.
   */
  static connectLayers(
    from: readonly Node[],
    to: readonly Node[],
    weightInitialization: WeightInitializationStrategy
  ): void {
    for (const target of to) {
      if (target.connections.in === null) {
        throw new Error('Cannot connect into an input node.');
      }
    }
    for (const source of from) {
      const outgoing = source.connections.out;
      if (outgoing === null) {
        throw new Error('Cannot connect out of an output node.');
      }
      for (const target of to) {
        const weight = weightInitialization.initialWeight(from.length, to.length);
        const connection = new Connection(source, target, weight);
        outgoing.push(connection);
        target.connections.in?.push(connection);
      }
    }
  }

  private static createNodes(
    type: NodeType,
    count: number,
    squash: ActivationFunction
  ): Node[] {
    return Array.from({ length: count }, () => new Node(type, squash));
  }

  private static assertLayerSize(label: string, count: number): void {
    if (!Number.isInteger(count) || count < 1) {
      throw new Error(
        `Invalid ${label} size: ${count}. Layer sizes must be positive integers.`
      );
    }
  }
}
