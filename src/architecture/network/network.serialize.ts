import fs from 'fs-extra';
import type Network from '../network';
import Architect from '../architect';
import type { ActivationFunction } from '../../methods/activation';
import type { WeightInitializationStrategy } from '../../methods/initialization';
import { InvalidDataError, ShapeMismatchError } from '../../utils/errors';
import {
  VALUE_DELIMITER,
  formatNumbers,
  readInteger,
  readIntegerList,
  readNumberList,
} from '../../utils/text';
import { onceWarn } from '../../utils/warnings';

/**
 * Text encoding of a network's trained state.
 *
 * Six lines, values separated by commas:
 *  1. `inputCount,outputCount`
 *  2. hidden layer sizes (blank when there are none)
 *  3. biases, in `network.nodes` order
 *  4. previous bias deltas, in `network.nodes` order
 *  5. weights, in `network.connections` order
 *  6. previous weight deltas, in `network.connections` order
 *
 * Activation functions are not stored: a decoded network uses the functions supplied in
 * {@link DeserializeOptions} (builder defaults otherwise), so the caller must pass the same
 * ones the network was built with.
 *
 * @module network.serialize
 */

const HEADER_ERROR = 'Invalid header line. Expected format: inputCount,outputCount';

/** How to rebuild the topology of a decoded network. */
export interface DeserializeOptions {
  activation?: ActivationFunction;
  outputActivation?: ActivationFunction;
  /** Only matters for value lines left blank in the encoding. */
  weightInitialization?: WeightInitializationStrategy;
}

/**
 * Encode the network's topology and trained values.
 *
 * @example
 * const text = serialize(Architect.build(2, 1, [3]));
 * text.split('\n')[0]; // '2,1'
 */
export function serialize(network: Network): string {
  const lines = [
    formatNumbers([network.input, network.output]),
    formatNumbers(network.hiddenLayerSizes),
    formatNumbers(network.nodes.map((n) => n.bias)),
    formatNumbers(network.nodes.map((n) => n.previousDeltaBias)),
    formatNumbers(network.connections.map((c) => c.weight)),
    formatNumbers(network.connections.map((c) => c.previousDeltaWeight)),
  ];
  return lines.join('\n') + '\n';
}

/**
 * Rebuild a network from {@link serialize} output.
 *
 * @throws {InvalidDataError} On a missing / short header or an unparsable value.
 * @throws {ShapeMismatchError} When a value line does not match the rebuilt topology.
 */
export function deserialize(text: string, options: DeserializeOptions = {}): Network {
  const lines = text.split(/\r?\n/);
  const header = lines[0]?.split(VALUE_DELIMITER) ?? [];
  if (header.length < 2 || header[0].trim() === '') {
    throw new InvalidDataError(HEADER_ERROR);
  }
  const inputCount = readInteger(header[0], 'inputCount');
  const outputCount = readInteger(header[1], 'outputCount');
  const hiddenLayerCounts = readIntegerList(lines[1], 'hiddenLayerCounts');

  if (!options.activation && !options.outputActivation) {
    onceWarn(
      'deserialize-default-activations',
      'deserialize: no activation functions given, using builder defaults (tanh / logistic)'
    );
  }

  const network = Architect.build(
    inputCount,
    outputCount,
    hiddenLayerCounts,
    options.activation,
    options.outputActivation,
    options.weightInitialization
  );

  const nodes = network.nodes;
  const connections = network.connections;
  assign(readNumberList(lines[2], 'biases'), nodes.length, 'Biases', (v, i) => {
    nodes[i].bias = v;
  });
  assign(readNumberList(lines[3], 'previousBiasDeltas'), nodes.length, 'Bias deltas', (v, i) => {
    nodes[i].previousDeltaBias = v;
  });
  assign(readNumberList(lines[4], 'weights'), connections.length, 'Weights', (v, i) => {
    connections[i].weight = v;
  });
  assign(
    readNumberList(lines[5], 'previousWeightDeltas'),
    connections.length,
    'Weight deltas',
    (v, i) => {
      connections[i].previousDeltaWeight = v;
    }
  );

  return network;
}

/** Apply a decoded value line; a blank line keeps the freshly built values. */
function assign(
  values: number[],
  expected: number,
  what: string,
  apply: (value: number, index: number) => void
): void {
  if (values.length === 0) return;
  if (values.length !== expected) {
    throw new ShapeMismatchError(what, expected, values.length);
  }
  values.forEach(apply);
}

/** Write {@link serialize} output to `filePath`, creating parent directories as needed. */
export async function saveNetwork(network: Network, filePath: string): Promise<void> {
  await fs.outputFile(filePath, serialize(network), 'utf8');
}

/** Read and decode a network written by {@link saveNetwork}. */
export async function loadNetwork(
  filePath: string,
  options: DeserializeOptions = {}
): Promise<Network> {
  const text = await fs.readFile(filePath, 'utf8');
  return deserialize(text, options);
}
