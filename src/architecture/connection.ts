/**
 * Connection (aka Synapse / Link)
 * ===============================
 * A `Connection` represents a directed, weighted edge between two `Node`s of adjacent layers.
 *
 * Stored state:
 * - References to the source (`from`) and target (`to`) nodes
 * - The weight applied to the source activation when propagating to the target
 * - The delta applied by the previous training step (classic momentum)
 *
 * A connection is listed exactly once in `from.connections.out` and once in
 * `to.connections.in`, at the index equal to the position of `from` in its layer.
 */
import type Node from './node';

export default class Connection {
  /** The source (pre-synaptic) node supplying activation. */
  readonly from: Node;
  /** The target (post-synaptic) node receiving activation. */
  readonly to: Node;
  /** Scalar multiplier applied to the source activation. */
  weight: number;
  /** Last applied delta weight (used by classic momentum). */
  previousDeltaWeight: number;

  /**
   * @param from Source node.
   * @param to Target node.
   * @param weight Initial weight.
   *
   * @example
   * const link = new Connection(nodeA, nodeB, 0.42);
   * console.log(link.weight); // 0.42
   */
  constructor(from: Node, to: Node, weight: number) {
    this.from = from;
    this.to = to;
    this.weight = weight;

    // For tracking momentum
    this.previousDeltaWeight = 0;
  }

  /** Weighted contribution of the source node to the target's pre-activation sum. */
  signal(): number {
    return this.weight * this.from.activation;
  }
}
