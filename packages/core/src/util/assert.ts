import { DEBUG_ASSERTIONS } from '../config/defaults.js';
import { InvariantError } from '../errors/index.js';

/**
 * Checks an internal invariant. Only evaluated when debug assertions are
 * on; production builds skip the check entirely, so `check` must be free of
 * side effects.
 */
export function debugAssert(check: () => boolean, msg: string): void {
  if (DEBUG_ASSERTIONS && !check()) throw new InvariantError(msg);
}
