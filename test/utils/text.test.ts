import {
  formatNumbers,
  readInteger,
  readIntegerList,
  readNumber,
  readNumberList,
} from '../../src/utils/text';
import { InvalidDataError, ShapeMismatchError } from '../../src/utils/errors';

describe('Text fields', () => {
  describe('Scenario: integers', () => {
    it('parses signed integers with surrounding spaces', () => {
      expect(readInteger(' 12 ', 'n')).toBe(12);
      expect(readInteger('-3', 'n')).toBe(-3);
    });

    it.each(['', '1.5', '2x', 'abc'])('rejects %p', (value) => {
      expect(() => readInteger(value, 'size')).toThrow(
        new InvalidDataError('Invalid integer value for size.')
      );
    });

    it('reads lists and treats blank lines as empty', () => {
      expect(readIntegerList('4,5', 'h')).toEqual([4, 5]);
      expect(readIntegerList('  ', 'h')).toEqual([]);
      expect(readIntegerList(undefined, 'h')).toEqual([]);
    });
  });

  describe('Scenario: numbers', () => {
    it('parses decimal and exponent notation', () => {
      expect(readNumber('-0.25', 'w')).toBe(-0.25);
      expect(readNumber('1e-7', 'w')).toBe(1e-7);
    });

    it('accepts non-finite values as written', () => {
      expect(readNumber('NaN', 'w')).toBeNaN();
      expect(readNumber('Infinity', 'w')).toBe(Infinity);
      expect(readNumber('-Infinity', 'w')).toBe(-Infinity);
    });

    it.each(['', ' ', 'nan', '0.1.2'])('rejects %p', (value) => {
      expect(() => readNumber(value, 'weights')).toThrow('Invalid number value for weights.');
    });

    it('reads lists', () => {
      expect(readNumberList('0.5,-1,2', 'b')).toEqual([0.5, -1, 2]);
      expect(readNumberList('', 'b')).toEqual([]);
    });
  });

  describe('Scenario: formatting', () => {
    it('joins with commas and parses back to the same values', () => {
      // Arrange
      const values = [0.1 + 0.2, -1 / 3, 1e21, NaN, -Infinity];
      // Act
      const text = formatNumbers(values);
      // Assert
      expect(text).toBe('0.30000000000000004,-0.3333333333333333,1e+21,NaN,-Infinity');
      expect(readNumberList(text, 'v')).toEqual(values);
    });

    it('keeps the sign of negative zero', () => {
      // Act
      const text = formatNumbers([-0, 0]);
      // Assert
      expect(text).toBe('-0,0');
      const [negative, positive] = readNumberList(text, 'v');
      expect(Object.is(negative, -0)).toBe(true);
      expect(Object.is(positive, 0)).toBe(true);
    });

    it('formats an empty list as an empty string', () => {
      expect(formatNumbers([])).toBe('');
    });
  });
});

describe('Errors', () => {
  it('ShapeMismatchError carries both sizes', () => {
    const error = new ShapeMismatchError('Biases', 3, 2);
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ShapeMismatchError);
    expect(error.name).toBe('ShapeMismatchError');
    expect(error.message).toBe('Biases size mismatch: expected 3, got 2');
    expect([error.expected, error.actual]).toEqual([3, 2]);
  });

  it('InvalidDataError is identifiable', () => {
    const error = new InvalidDataError('bad');
    expect(error).toBeInstanceOf(InvalidDataError);
    expect(error.name).toBe('InvalidDataError');
  });
});
