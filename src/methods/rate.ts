/**
 * A learning rate policy maps the configured (base) rate and the magnitude of the
 * current error signal to the rate actually used for one update step.
 */
export type RatePolicy = (baseRate: number, gradientMagnitude: number) => number;

/**
 * Learning rate policies used by {@link Backpropagation}.
 *
 * The fixed policy is the classic constant step. The gradient-scaled policy takes
 * larger steps while the error signal is large and falls back to the base rate as the
 * network converges.
 *
 * @see {@link https://en.wikipedia.org/wiki/Learning_rate Learning Rate on Wikipedia}
 */
export default class Rate {
  /**
   * Constant learning rate: always returns `baseRate`, whatever the gradient.
   *
   * @returns Policy returning the base rate unchanged.
   */
  static fixed(): RatePolicy {
    const func = (baseRate: number, gradientMagnitude: number): number => {
      return baseRate;
    };

    return func;
  }

  /**
   * Gradient-scaled learning rate.
   *
   * Formula: `rate = baseRate * (1 + (maxScale - 1) * tanh(|gradientMagnitude|))`
   *
   * - Equals `baseRate` for a zero gradient, so it is strictly positive whenever the
   *   base rate is.
   * - Monotonically non-decreasing in `|gradientMagnitude|`.
   * - Never exceeds `maxScale * baseRate`, which bounds how much faster than the fixed
   *   policy it can step.
   *
   * @param maxScale Upper bound of the multiplier (>= 1). Defaults to 2.
   * @returns Policy computing the scaled rate.
   */
  static gradientScaled(maxScale: number = 2): RatePolicy {
    if (!(maxScale >= 1)) {
      throw new Error('maxScale must be >= 1');
    }
    const func = (baseRate: number, gradientMagnitude: number): number => {
      return (
        baseRate * (1 + (maxScale - 1) * Math.tanh(Math.abs(gradientMagnitude)))
      );
    };

    return func;
  }
}
