import fs from 'fs-extra';
import TrainingData from './trainingData';
import { formatNumber, formatNumbers, readNumber, readNumberList } from '../utils/text';
import { warn } from '../utils/warnings';

/**
 * Line-oriented text encoding of training examples:
 *
 *   i1,i2,...;o1,o2,...[;reward]
 *
 * One example per line. Blank lines and lines with fewer than two `;` separated fields are
 * skipped.
 *
 * @module trainingData.serialize
 */

const FIELD_DELIMITER = ';';

/** Encode one example as a single line (no trailing newline). */
export function serializeExample(example: TrainingData): string {
  let line =
    formatNumbers(example.inputs) + FIELD_DELIMITER + formatNumbers(example.outputs);
  if (example.reward !== undefined) line += FIELD_DELIMITER + formatNumber(example.reward);
  return line;
}

/** Encode examples, one line each, every line newline-terminated. */
export function serializeTrainingData(examples: Iterable<TrainingData>): string {
  let text = '';
  for (const example of examples) text += serializeExample(example) + '\n';
  return text;
}

/**
 * Decode {@link serializeTrainingData} output.
 *
 * @throws {InvalidDataError} When a field of a kept line is not a number.
 * @example
 * deserializeTrainingData('0,1;1\n1,1;0;-1\n');
 * // => [TrainingData{ inputs:[0,1], outputs:[1] }, TrainingData{ inputs:[1,1], outputs:[0], reward:-1 }]
 */
export function deserializeTrainingData(text: string): TrainingData[] {
  const examples: TrainingData[] = [];
  text.split(/\r?\n/).forEach((line, lineIndex) => {
    if (line.trim() === '') return;
    const fields = line.split(FIELD_DELIMITER);
    if (fields.length < 2) {
      warn(`training data line ${lineIndex + 1} has no output field, skipping`);
      return;
    }
    const reward = fields.length > 2 ? readNumber(fields[2], 'reward') : undefined;
    examples.push(
      new TrainingData(
        readNumberList(fields[0], 'input'),
        readNumberList(fields[1], 'output'),
        reward
      )
    );
  });
  return examples;
}

/** Write examples to `filePath`, creating parent directories as needed. */
export async function saveTrainingData(
  examples: Iterable<TrainingData>,
  filePath: string
): Promise<void> {
  await fs.outputFile(filePath, serializeTrainingData(examples), 'utf8');
}

/** Read examples written by {@link saveTrainingData}; a missing file yields `[]`. */
export async function loadTrainingData(filePath: string): Promise<TrainingData[]> {
  if (!(await fs.pathExists(filePath))) return [];
  const text = await fs.readFile(filePath, 'utf8');
  return deserializeTrainingData(text);
}
