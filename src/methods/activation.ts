/**
 * Activation (squashing) functions used by network nodes.
 *
 * Activation functions introduce non-linearity into the network, allowing it to
 * learn patterns a linear map cannot express. Unlike the usual `f'(x)` formulation,
 * every {@link ActivationFunction} here takes the *output* `y = f(x)` in its
 * `derivative`, so backpropagation can reuse the value a node already stores instead
 * of keeping the pre-activation sum around:
 *
 *   derivative(invoke(x)) === f'(x)
 *
 * The instances are stateless and shared by every node that uses them.
 *
 * @see {@link https://en.wikipedia.org/wiki/Activation_function}
 */
export interface ActivationFunction {
  /** Stable identifier, used when looking a function up by name. */
  readonly name: string;
  /** Apply the function to a pre-activation sum. */
  invoke(x: number): number;
  /** Derivative expressed in terms of the function's output `y`. */
  derivative(y: number): number;
}

/**
 * Logistic (sigmoid) function. Outputs values in (0, 1); the default for output layers.
 * Derivative: `y * (1 - y)`.
 */
const logistic: ActivationFunction = Object.freeze({
  name: 'logistic',
  invoke: (x: number): number => 1 / (1 + Math.exp(-x)),
  derivative: (y: number): number => y * (1 - y),
});

/**
 * Hyperbolic tangent. Outputs values in (-1, 1); zero-centered, the default for hidden layers.
 * Derivative: `(1 - y) * (1 + y)`.
 */
const tanh: ActivationFunction = Object.freeze({
  name: 'tanh',
  invoke: (x: number): number => Math.tanh(x),
  derivative: (y: number): number => (1 - y) * (1 + y),
});

/**
 * Rectified linear unit: `max(0, x)`.
 * Derivative: 1 where the unit is active (`y > 0`), 0 otherwise.
 */
const relu: ActivationFunction = Object.freeze({
  name: 'relu',
  invoke: (x: number): number => (x > 0 ? x : 0),
  derivative: (y: number): number => (y > 0 ? 1 : 0),
});

/**
 * Collection of the built-in activation functions.
 *
 * @example
 * Activation.tanh.invoke(0.5);            // 0.4621...
 * Activation.byName('logistic') === Activation.logistic; // true
 */
export class Activation {
  static readonly logistic: ActivationFunction = logistic;
  static readonly tanh: ActivationFunction = tanh;
  static readonly relu: ActivationFunction = relu;

  /** All built-in functions in declaration order. */
  static all(): ActivationFunction[] {
    return [logistic, tanh, relu];
  }

  /**
   * Look up a built-in function by its `name`.
   * @throws {Error} When no built-in function carries that name.
   */
  static byName(name: string): ActivationFunction {
    const found = Activation.all().find((fn) => fn.name === name);
    if (!found) throw new Error(`Unknown activation function: ${name}`);
    return found;
  }
}

export default Activation;
