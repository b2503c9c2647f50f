// packages/core/src/uri/split.ts
import { Scheme } from '../scheme/Scheme.js';
import { scanPrefix, type SchemeBoundary } from '../scheme/parser.js';
import { describeProtocol } from '../scheme/protocols.js';
import { toBytes } from '../util/bytes.js';
import { silentLogger, type Logger } from '../util/logger.js';

export interface SchemeSplit {
  boundary: SchemeBoundary;
  /** `undefined` for a relative reference */
  scheme  : Scheme | undefined;
  /** Everything after `://`, or the whole input when there is no scheme. */
  rest    : Uint8Array;
}

const DELIMITER_LEN = 3; // "://"

/**
 * Separate the scheme of a full URI from the remainder. Both `scheme` (for
 * non-known schemes) and `rest` are views into the input bytes, which must
 * not be modified while either is in use.
 *
 * @throws {SchemeTooLongError} scheme before `://` longer than 64 bytes
 * @throws {InvalidSchemeError} input starts with `://`
 */
export function splitScheme(input: string | Uint8Array, log: Logger = silentLogger): SchemeSplit {
  const bytes    = toBytes(input);
  const boundary = scanPrefix(bytes);
  const l        = log.child('split');

  switch (boundary.kind) {
    case 'none':
      l.log(4, `no scheme in ${bytes.length} bytes`);
      return { boundary, scheme: undefined, rest: bytes };

    case 'standard': {
      const name = describeProtocol(boundary.protocol).name;
      l.log(4, `known protocol ${name}`);
      return {
        boundary,
        scheme: Scheme.fromBoundary(bytes, boundary),
        rest  : bytes.subarray(name.length + DELIMITER_LEN),
      };
    }

    case 'other':
      l.log(4, `scheme boundary at ${boundary.length}`);
      return {
        boundary,
        scheme: Scheme.fromShared(bytes, boundary.length),
        rest  : bytes.subarray(boundary.length + DELIMITER_LEN),
      };
  }
}
