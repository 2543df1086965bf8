/**
 * tinymlp: small fully connected feed-forward networks trained by backpropagation.
 *
 * @example
 * import { Architect, Backpropagation, Trainer, TrainingData } from 'tinymlp';
 *
 * const net = Architect.build(2, 1, [3]);
 * const trainer = new Trainer(new Backpropagation({ learningRate: 0.2, momentum: 0.1 }), [
 *   ['00', new TrainingData([0, 0], [0])],
 *   ['01', new TrainingData([0, 1], [1])],
 *   ['10', new TrainingData([1, 0], [1])],
 *   ['11', new TrainingData([1, 1], [0])],
 * ]);
 * trainer.retrain(net, 0.05, 10000);
 */
import * as methods from './methods/methods';

export { methods };
export * from './methods/methods';
export { config, type TinyMlpConfig } from './config';
export { default as Node, type NodeType } from './architecture/node';
export { default as Connection } from './architecture/connection';
export { default as Network } from './architecture/network';
export { default as Architect } from './architecture/architect';
export {
  serialize,
  deserialize,
  saveNetwork,
  loadNetwork,
  type DeserializeOptions,
} from './architecture/network/network.serialize';
export type { TrainingAlgorithm } from './training/trainingAlgorithm';
export {
  default as Backpropagation,
  type BackpropagationOptions,
} from './training/backpropagation';
export { default as TrainingData } from './training/trainingData';
export {
  default as Trainer,
  type CompletionPredicate,
  type TrainUntilState,
} from './training/trainer';
export {
  serializeExample,
  serializeTrainingData,
  deserializeTrainingData,
  saveTrainingData,
  loadTrainingData,
} from './training/trainingData.serialize';
export { ShapeMismatchError, InvalidDataError } from './utils/errors';
export { warn, onceWarn } from './utils/warnings';
