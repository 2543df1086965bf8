import { config } from '../config';

/** Keys of one-time notices already emitted in this process. */
const seen = new Set<string>();

/**
 * Emit a warning through `console.warn` when `config.warnings` is enabled.
 *
 * @param message Human readable warning text (prefixed with `[tinymlp]`).
 */
export function warn(message: string): void {
  if (!config.warnings) return;
  // eslint-disable-next-line no-console
  console.warn(`[tinymlp] ${message}`);
}

/**
 * Like {@link warn} but emitted at most once per `key` for the process lifetime.
 * A suppressed call (warnings disabled) does not consume the key.
 */
export function onceWarn(key: string, message: string): void {
  if (!config.warnings || seen.has(key)) return;
  warn(message);
  seen.add(key);
}

/** Forget every key recorded by {@link onceWarn} (test helper). */
export function resetWarnings(): void {
  seen.clear();
}
