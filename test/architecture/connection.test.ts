import Connection from '../../src/architecture/connection';
import Node from '../../src/architecture/node';

describe('Connection', () => {
  describe('Scenario: construction', () => {
    it('keeps its endpoints and weight and starts with no momentum', () => {
      // Arrange
      const from = new Node('input');
      const to = new Node('output');
      // Act
      const link = new Connection(from, to, 0.42);
      // Assert
      expect(link.from).toBe(from);
      expect(link.to).toBe(to);
      expect(link.weight).toBe(0.42);
      expect(link.previousDeltaWeight).toBe(0);
    });
  });

  describe('Scenario: signal', () => {
    it('multiplies the source activation by the weight', () => {
      // Arrange
      const from = new Node('input');
      const link = new Connection(from, new Node('output'), -0.5);
      from.activate(3);
      // Act
      const signal = link.signal();
      // Assert
      expect(signal).toBe(-1.5);
    });
  });
});
