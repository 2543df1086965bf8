import { InvalidDataError } from './errors';

/** Field separator shared by the text encodings. */
export const VALUE_DELIMITER = ',';

const INTEGER = /^[+-]?\d+$/;
const NON_FINITE = new Set(['NaN', 'Infinity', '-Infinity']);

/**
 * Parse a base-10 integer field.
 * @throws {InvalidDataError} `Invalid integer value for <name>.`
 */
export function readInteger(value: string, name: string): number {
  const trimmed = value.trim();
  if (!INTEGER.test(trimmed)) {
    throw new InvalidDataError(`Invalid integer value for ${name}.`);
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Parse a numeric field. `NaN`, `Infinity` and `-Infinity` are accepted as written by
 * {@link formatNumbers}, so non-finite weights survive a round trip.
 * @throws {InvalidDataError} `Invalid number value for <name>.`
 */
export function readNumber(value: string, name: string): number {
  const trimmed = value.trim();
  if (NON_FINITE.has(trimmed)) return Number(trimmed);
  const parsed = trimmed === '' ? NaN : Number(trimmed);
  if (Number.isNaN(parsed)) {
    throw new InvalidDataError(`Invalid number value for ${name}.`);
  }
  return parsed;
}

/** Parse a delimited line of numbers; a blank line yields an empty array. */
export function readNumberList(line: string | undefined, name: string): number[] {
  if (line === undefined || line.trim() === '') return [];
  return line.split(VALUE_DELIMITER).map((v) => readNumber(v, name));
}

/** Parse a delimited line of integers; a blank line yields an empty array. */
export function readIntegerList(line: string | undefined, name: string): number[] {
  if (line === undefined || line.trim() === '') return [];
  return line.split(VALUE_DELIMITER).map((v) => readInteger(v, name));
}

/** Shortest representation of `value` that parses back to the same value, `-0` included. */
export function formatNumber(value: number): string {
  return Object.is(value, -0) ? '-0' : String(value);
}

/** Join numbers with {@link formatNumber}. */
export function formatNumbers(values: Iterable<number>): string {
  return Array.from(values, formatNumber).join(VALUE_DELIMITER);
}
