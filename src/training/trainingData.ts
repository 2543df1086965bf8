/**
 * One labelled example: input vector, expected output vector and an optional reward that
 * scales the error signal when the example is trained (absent means 1).
 *
 * The vectors are copied and frozen at construction; the reward can be changed later,
 * e.g. to reinforce or punish an example after its outcome is known.
 *
 * @example
 * const sample = new TrainingData([0, 1], [1]);
 * sample.reward = -0.5; // push the network away from this answer
 */
export default class TrainingData {
  readonly inputs: readonly number[];
  readonly outputs: readonly number[];
  reward?: number;

  constructor(inputs: readonly number[], outputs: readonly number[], reward?: number) {
    this.inputs = Object.freeze([...inputs]);
    this.outputs = Object.freeze([...outputs]);
    this.reward = reward;
  }
}
