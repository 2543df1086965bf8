import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import Architect from '../../src/architecture/architect';
import {
  deserialize,
  loadNetwork,
  saveNetwork,
  serialize,
} from '../../src/architecture/network/network.serialize';
import { Activation } from '../../src/methods/activation';
import { XavierNormalInitialization } from '../../src/methods/initialization';
import { InvalidDataError, ShapeMismatchError } from '../../src/utils/errors';
import { config } from '../../src/config';
import Backpropagation from '../../src/training/backpropagation';
import { buildWithWeights, snapshotParameters } from '../utils/test-helpers';

describe('Network serialization', () => {
  describe('Scenario: encoding layout', () => {
    it('writes six lines with a trailing newline', () => {
      // Arrange
      const net = buildWithWeights(1, 1, [], [0.5]);
      // Act
      const text = serialize(net);
      // Assert
      expect(text).toBe('1,1\n\n0.01,0.01\n0,0\n0.5\n0\n');
    });

    it('lists hidden layer sizes on the second line', () => {
      const net = Architect.build(3, 2, [4, 5]);
      expect(serialize(net).split('\n').slice(0, 2)).toEqual(['3,2', '4,5']);
    });
  });

  describe('Scenario: round trip', () => {
    it('restores topology, parameters and momentum state', () => {
      // Arrange: train a step so the deltas are non-zero
      const net = Architect.build(2, 1, [3], Activation.tanh, Activation.logistic,
        XavierNormalInitialization.seeded(5));
      new Backpropagation({ learningRate: 0.3, momentum: 0.2 }).train(net, [1, 0], 1, [1]);
      // Act
      const copy = deserialize(serialize(net), {
        activation: Activation.tanh,
        outputActivation: Activation.logistic,
      });
      // Assert
      expect(copy.hiddenLayerSizes).toEqual([3]);
      expect(snapshotParameters(copy)).toEqual(snapshotParameters(net));
      expect(copy.nodes.map((n) => n.previousDeltaBias)).toEqual(
        net.nodes.map((n) => n.previousDeltaBias)
      );
      expect(copy.connections.map((c) => c.previousDeltaWeight)).toEqual(
        net.connections.map((c) => c.previousDeltaWeight)
      );
      expect(copy.activate([0.2, 0.7])).toEqual(net.activate([0.2, 0.7]));
    });

    it('keeps negative zero deltas', () => {
      // Arrange: a zero source activation with a negative gradient gives a -0 delta
      const net = buildWithWeights(1, 1, [], [0.5]);
      net.connections[0].previousDeltaWeight = -0;
      net.outputs[0].previousDeltaBias = -0;
      // Act
      const text = serialize(net);
      const copy = deserialize(text, { activation: Activation.tanh });
      // Assert
      expect(text).toBe('1,1\n\n0.01,0.01\n0,-0\n0.5\n-0\n');
      expect(Object.is(copy.connections[0].previousDeltaWeight, -0)).toBe(true);
      expect(Object.is(copy.outputs[0].previousDeltaBias, -0)).toBe(true);
    });

    it('uses the supplied activation functions', () => {
      const net = Architect.build(1, 1, [1], Activation.relu, Activation.tanh);
      const copy = deserialize(serialize(net), {
        activation: Activation.relu,
        outputActivation: Activation.tanh,
      });
      expect(copy.hiddenLayers[0][0].squash).toBe(Activation.relu);
      expect(copy.outputs[0].squash).toBe(Activation.tanh);
    });

    it('accepts CRLF line endings', () => {
      const net = buildWithWeights(1, 1, [], [0.5]);
      const copy = deserialize(serialize(net).replace(/\n/g, '\r\n'));
      expect(copy.connections[0].weight).toBe(0.5);
    });

    it('keeps freshly built values for blank value lines', () => {
      // Act
      const copy = deserialize('2,1\n\n\n\n\n\n');
      // Assert
      expect(copy.nodes.map((n) => n.bias)).toEqual([0.01, 0.01, 0.01]);
      expect(copy.connections).toHaveLength(2);
    });
  });

  describe('Scenario: malformed input', () => {
    it.each(['', '3', ',1'])('rejects header %p', (text) => {
      expect(() => deserialize(text)).toThrow(
        new InvalidDataError('Invalid header line. Expected format: inputCount,outputCount')
      );
    });

    it('rejects a non-integer layer size', () => {
      expect(() => deserialize('x,1\n')).toThrow('Invalid integer value for inputCount.');
      expect(() => deserialize('2,1\n3,a\n')).toThrow(
        'Invalid integer value for hiddenLayerCounts.'
      );
    });

    it('rejects an unparsable value', () => {
      expect(() => deserialize('1,1\n\n0.1,abc\n')).toThrow(InvalidDataError);
      expect(() => deserialize('1,1\n\n0.1,abc\n')).toThrow('Invalid number value for biases.');
    });

    it('rejects a value line of the wrong length', () => {
      expect(() => deserialize('1,1\n\n0.1\n')).toThrow(ShapeMismatchError);
      expect(() => deserialize('1,1\n\n0.1,0.2\n0,0\n1,2\n')).toThrow(
        'Weights size mismatch: expected 1, got 2'
      );
    });

    it('rejects invalid layer sizes through the builder', () => {
      expect(() => deserialize('0,1\n')).toThrow('Invalid input size: 0');
    });
  });

  describe('Scenario: default activation notice', () => {
    it('warns once when no activation functions are given', () => {
      // Arrange
      config.warnings = true;
      const spy = jest.spyOn(console, 'warn');
      // Act
      deserialize('1,1\n');
      deserialize('1,1\n');
      // Assert
      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy).toHaveBeenCalledWith(
        '[tinymlp] deserialize: no activation functions given, using builder defaults (tanh / logistic)'
      );
      spy.mockRestore();
    });
  });

  describe('Scenario: files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tinymlp-net-'));
    });

    afterEach(async () => {
      await fs.remove(dir);
    });

    it('saves into missing directories and loads back', async () => {
      // Arrange
      const net = buildWithWeights(2, 1, [2], [0.1, 0.2, 0.3, 0.4, 0.5, 0.6]);
      const file = path.join(dir, 'nested', 'net.txt');
      // Act
      await saveNetwork(net, file);
      const copy = await loadNetwork(file, { activation: Activation.tanh });
      // Assert
      expect(await fs.readFile(file, 'utf8')).toBe(serialize(net));
      expect(snapshotParameters(copy)).toEqual(snapshotParameters(net));
    });

    it('rejects when the file does not exist', async () => {
      await expect(loadNetwork(path.join(dir, 'missing.txt'))).rejects.toThrow();
    });
  });
});
