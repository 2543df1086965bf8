import TrainingData from '../../src/training/trainingData';

describe('TrainingData', () => {
  it('copies and freezes its vectors', () => {
    // Arrange
    const inputs = [0, 1];
    const outputs = [1];
    // Act
    const sample = new TrainingData(inputs, outputs);
    inputs[0] = 9;
    // Assert
    expect(sample.inputs).toEqual([0, 1]);
    expect(Object.isFrozen(sample.inputs)).toBe(true);
    expect(Object.isFrozen(sample.outputs)).toBe(true);
    expect(sample.reward).toBeUndefined();
  });

  it('allows the reward to change after construction', () => {
    const sample = new TrainingData([0], [1], 2);
    sample.reward = -0.5;
    expect(sample.reward).toBe(-0.5);
  });
});
