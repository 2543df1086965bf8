// Barrel for the stateless building blocks (activation, initialization, learning rate).
export { Activation, type ActivationFunction } from './activation';
export {
  FixedRandomInitialization,
  XavierNormalInitialization,
  XavierUniformInitialization,
  seededRandom,
  type RandomSource,
  type WeightInitializationStrategy,
} from './initialization';
export { default as Rate, type RatePolicy } from './rate';
