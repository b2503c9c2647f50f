// packages/core/src/index.ts

import { Scheme }                          from './scheme/Scheme.js';
import { scanPrefix, type SchemeBoundary } from './scheme/parser.js';
import { toBytes }                         from './util/bytes.js';

/**
 * Validate `input` as exactly one scheme token (`"http"`, `"git+ssh"`).
 * Known protocol spellings, in any case, come back as the shared constants.
 *
 * @throws {InvalidSchemeError} empty input, `:` or any other non-scheme byte
 * @throws {SchemeTooLongError} more than 64 bytes
 */
export function parseSchemeExact(input: string | Uint8Array): Scheme {
  return Scheme.parse(input);
}

/**
 * Find the `<scheme>://` prefix of a complete URI. A missing scheme is a
 * result (`{ kind: 'none' }`), not an error.
 *
 * @throws {SchemeTooLongError} more than 64 bytes before `://`
 */
export function scanSchemePrefix(input: string | Uint8Array): SchemeBoundary {
  return scanPrefix(toBytes(input));
}

export { Scheme } from './scheme/Scheme.js';
export type { SchemeBoundary } from './scheme/parser.js';
export { Protocol } from './scheme/protocols.js';
export { Version, resolveDefaultVersion } from './version/Version.js';
export { splitScheme, type SchemeSplit } from './uri/split.js';
export { ENABLED_FAMILIES, PROTOCOL_FAMILIES, type ProtocolFamily } from './config/features.js';
export { MAX_SCHEME_LEN } from './config/defaults.js';
export { createLogger, type Logger, type Verbosity } from './util/logger.js';
export {
  UriError,
  InvalidUriError,
  InvalidSchemeError,
  SchemeTooLongError,
  ConfigurationError,
  InvariantError,
  type ErrorKind,
} from './errors/index.js';
