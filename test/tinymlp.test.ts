import {
  Architect,
  Backpropagation,
  Trainer,
  TrainingData,
  XavierNormalInitialization,
  deserialize,
  methods,
  serialize,
} from '../src/tinymlp';

describe('tinymlp entry point', () => {
  it('exposes the building blocks under methods', () => {
    expect(methods.Activation.tanh.name).toBe('tanh');
    expect(methods.Rate.fixed()(0.3, 1)).toBe(0.3);
  });

  describe('Scenario: train, save and restore', () => {
    it('a restored network answers like the trained one', () => {
      // Arrange
      const net = Architect.build(1, 1, [2], methods.Activation.tanh, methods.Activation.logistic,
        XavierNormalInitialization.seeded('entry'));
      const trainer = new Trainer(new Backpropagation({ learningRate: 0.5, momentum: 0.1 }), [
        ['low', new TrainingData([0], [0.2])],
        ['high', new TrainingData([1], [0.8])],
      ]);
      trainer.retrain(net, 0.05, 20000);
      // Act
      const restored = deserialize(serialize(net), {
        activation: methods.Activation.tanh,
        outputActivation: methods.Activation.logistic,
      });
      // Assert
      expect(restored.activate([0])).toEqual(net.activate([0]));
      expect(restored.activate([1])).toEqual(net.activate([1]));
    });
  });
});
