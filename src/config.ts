/**
 * Global tinymlp configuration contract & default instance.
 *
 * A central `config` object offers a documented surface for end-users (and tests)
 * to tweak library behaviour without digging through scattered constants.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'tinymlp';
 *   config.warnings = true;        // enable runtime warnings
 *   config.initialBias = 0;        // networks built from now on start with zero bias
 *
 * Adjust BEFORE constructing networks / trainers so that they pick up the intended values.
 * Networks and algorithms already constructed keep the values they were created with.
 */
export interface TinyMlpConfig {
  /**
   * Emit training and decoding warnings through `console.warn`.
   * Default: false
   */
  warnings: boolean;

  /**
   * Bias assigned to every node created by {@link Architect.build}.
   * Default: 0.01
   */
  initialBias: number;

  /**
   * Learning rate used by a {@link Backpropagation} constructed without an explicit rate.
   * Default: 0.1
   */
  defaultLearningRate: number;

  /**
   * Momentum used by a {@link Backpropagation} constructed without an explicit momentum.
   * Default: 0 (plain gradient descent)
   */
  defaultMomentum: number;
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: TinyMlpConfig = {
  warnings: false, // emit runtime guidance
  initialBias: 0.01, // bias of freshly built nodes
  defaultLearningRate: 0.1,
  defaultMomentum: 0,
};
