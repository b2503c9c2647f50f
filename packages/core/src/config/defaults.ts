import { isNodeLike } from '../util/bytes.js';

// Require the scheme to not be too long so callers can rely on a small,
// bounded token size.
export const MAX_SCHEME_LEN = 64;

/**
 * Internal consistency checks (re-validating shared slices and the like).
 * Off only for production Node builds; browsers keep them on.
 */
export const DEBUG_ASSERTIONS: boolean =
  !(isNodeLike() && process.env.NODE_ENV === 'production');
