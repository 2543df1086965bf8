import type Node from './node';
import type Connection from './connection';
import {
  fire as _fire,
  feedForward as _feedForward,
  activate as _activate,
} from './network/network.activate';

/**
 * A layered, fully connected feed-forward network.
 *
 * The topology is fixed at construction (see {@link Architect.build}); only weights, biases,
 * activations and gradients change afterwards. Every node of layer k has one outgoing
 * connection per node of layer k+1 and one incoming connection per node of layer k-1,
 * with no cycles and no skip connections.
 *
 * Two flattened, read-only traversals are precomputed because serialization and training
 * both depend on a stable order:
 *  - `nodes`: input nodes, then each hidden layer (nearest the inputs first), then outputs.
 *  - `connections`: the outgoing connections of every input node, then of every hidden node
 *    in forward layer order; within a node, in the order of the next layer.
 */
export default class Network {
  readonly inputs: readonly Node[];
  readonly hiddenLayers: readonly (readonly Node[])[];
  readonly outputs: readonly Node[];
  readonly nodes: readonly Node[];
  readonly connections: readonly Connection[];

  /**
   * Wrap already wired layers. Callers normally use {@link Architect.build}, which takes care
   * of allocating nodes and connecting consecutive layers.
   */
  constructor(
    inputs: readonly Node[],
    hiddenLayers: readonly (readonly Node[])[],
    outputs: readonly Node[]
  ) {
    this.inputs = inputs;
    this.hiddenLayers = hiddenLayers;
    this.outputs = outputs;

    const nodes: Node[] = [...inputs];
    for (const layer of hiddenLayers) nodes.push(...layer);
    nodes.push(...outputs);
    this.nodes = nodes;

    const connections: Connection[] = [];
    for (const node of inputs) connections.push(...(node.connections.out ?? []));
    for (const layer of hiddenLayers) {
      for (const node of layer) connections.push(...(node.connections.out ?? []));
    }
    this.connections = connections;
  }

  /** Number of input nodes. */
  get input(): number {
    return this.inputs.length;
  }

  /** Number of output nodes. */
  get output(): number {
    return this.outputs.length;
  }

  /** Sizes of the hidden layers, nearest the inputs first. */
  get hiddenLayerSizes(): number[] {
    return this.hiddenLayers.map((layer) => layer.length);
  }

  /**
   * Assign `input` to the input nodes and propagate forward.
   * @throws {ShapeMismatchError} If `input.length !== this.input`.
   */
  fire(input: readonly number[]): void {
    _fire.call(this, input);
  }

  /** Recompute hidden and output activations from the current input activations. */
  feedForward(): void {
    _feedForward.call(this);
  }

  /**
   * Fire the network and return a copy of the output activations.
   * @throws {ShapeMismatchError} If `input.length !== this.input`.
   */
  activate(input: readonly number[]): number[] {
    return _activate.call(this, input);
  }

  /** Current output activations (copy). */
  outputValues(): number[] {
    return this.outputs.map((node) => node.activation);
  }
}
