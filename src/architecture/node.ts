import type Connection from './connection';
import { Activation, type ActivationFunction } from '../methods/activation';
import { config } from '../config';

/** Position of a node in the layered network. */
export type NodeType = 'input' | 'hidden' | 'output';

/**
 * Represents a node (neuron) in a fully connected feed-forward network.
 *
 * Nodes receive the weighted activations of the previous layer, add their bias and apply
 * their activation function. Input nodes have no incoming connections: the value assigned
 * to them is their output as-is, even though an activation function is attached for
 * uniformity. Output nodes have no outgoing connections.
 *
 * During training a node also carries its backpropagation `gradient` and the bias delta
 * applied by the previous step (for momentum).
 */
export default class Node {
  /** Role of the node; decides which connection arrays exist. */
  readonly type: NodeType;
  /**
   * The activation function (squashing function) applied to the node's weighted input sum.
   */
  squash: ActivationFunction;
  /**
   * The bias value of the node. Added to the weighted sum of inputs before activation.
   */
  bias: number;
  /**
   * The change in bias applied in the previous training iteration. Used for momentum.
   */
  previousDeltaBias: number;
  /**
   * The output value of the node. For input nodes this is the externally assigned value.
   */
  activation: number;
  /**
   * Error signal of the node computed by the last backward pass.
   */
  gradient: number;
  /**
   * Incoming and outgoing connections. `in` is `null` for input nodes and `out` is `null`
   * for output nodes; `in[i]` always originates from node `i` of the previous layer.
   */
  connections: {
    in: Connection[] | null;
    out: Connection[] | null;
  };

  /**
   * @param type The role of the node. Defaults to 'hidden'.
   * @param squash Activation function. Defaults to logistic.
   * @param bias Initial bias. Defaults to `config.initialBias`.
   */
  constructor(
    type: NodeType = 'hidden',
    squash: ActivationFunction = Activation.logistic,
    bias: number = config.initialBias
  ) {
    this.type = type;
    this.squash = squash;
    this.bias = bias;
    this.previousDeltaBias = 0;
    this.activation = 0;
    this.gradient = 0;
    this.connections = {
      in: type === 'input' ? null : [],
      out: type === 'output' ? null : [],
    };
  }

  /**
   * Activates the node.
   *
   * Nodes without incoming connections take `input` as their activation (or keep the current
   * one when it is omitted). Other nodes ignore `input` and compute
   * `squash(Σ weight * from.activation + bias)`.
   *
   * @param input Value to assign to a node without incoming connections.
   * @returns The node's activation after the call.
   */
  activate(input?: number): number {
    const incoming = this.connections.in;
    if (incoming === null) {
      if (typeof input !== 'undefined') this.activation = input;
      return this.activation;
    }

    let sum = 0;
    for (const connection of incoming) {
      sum += connection.signal();
    }
    this.activation = this.squash.invoke(sum + this.bias);
    return this.activation;
  }

  /** Derivative of the activation function at the node's current output. */
  derivative(): number {
    return this.squash.derivative(this.activation);
  }

  /** Number of incoming connections (0 for input nodes). */
  get fanIn(): number {
    return this.connections.in?.length ?? 0;
  }

  /** Number of outgoing connections (0 for output nodes). */
  get fanOut(): number {
    return this.connections.out?.length ?? 0;
  }
}
