// packages/core/src/version/Version.ts
import { ENABLED_FAMILIES, isFamilyEnabled, type ProtocolFamily } from '../config/features.js';
import { ConfigurationError } from '../errors/index.js';
import { INSPECT } from '../util/inspect.js';

/**
 * A protocol/version pair. Members are ordered by declaration, so
 * `v.isAtLeast(Version.HTTP_11)` reads as a version comparison.
 *
 * ```ts
 * Version.HTTP_2.asStr();                     // 'HTTP/2.0'
 * Version.HTTP_2.isAtLeast(Version.HTTP_11);  // true
 * ```
 */
export class Version {
  /** `HTTP/0.9` */
  static readonly HTTP_09 = new Version(0, 'http', 'HTTP/0.9');
  /** `HTTP/1.0` */
  static readonly HTTP_10 = new Version(1, 'http', 'HTTP/1.0');
  /** `HTTP/1.1` */
  static readonly HTTP_11 = new Version(2, 'http', 'HTTP/1.1');
  /** `HTTP/2.0` */
  static readonly HTTP_2  = new Version(3, 'http', 'HTTP/2.0');
  /** `HTTP/3.0` */
  static readonly HTTP_3  = new Version(4, 'http', 'HTTP/3.0');
  /** `RTSP/1.0` */
  static readonly RTSP_1  = new Version(5, 'rtsp', 'RTSP/1.0');

  private static readonly ALL: readonly Version[] = Object.freeze([
    Version.HTTP_09, Version.HTTP_10, Version.HTTP_11,
    Version.HTTP_2,  Version.HTTP_3,  Version.RTSP_1,
  ]);

  private constructor(
    readonly ordinal: number,
    readonly family : ProtocolFamily,
    private readonly text: string,
  ) {}

  /** Members of the given families, in declaration order. */
  static values(families: readonly ProtocolFamily[] = ENABLED_FAMILIES): readonly Version[] {
    return Version.ALL.filter(v => isFamilyEnabled(v.family, families));
  }

  /**
   * Default version of this build.
   * @throws {ConfigurationError} when no protocol family is enabled
   */
  static default(): Version {
    return resolveDefaultVersion(ENABLED_FAMILIES);
  }

  asStr(): string { return this.text; }

  toString(): string { return this.text; }

  toJSON(): string { return this.text; }

  compare(other: Version): -1 | 0 | 1 {
    return this.ordinal < other.ordinal ? -1 : this.ordinal > other.ordinal ? 1 : 0;
  }

  equals(other: Version): boolean {
    return this.ordinal === other.ordinal;
  }

  isAtLeast(other: Version): boolean {
    return this.ordinal >= other.ordinal;
  }

  hashCode(): number {
    return this.ordinal;
  }

  [INSPECT](): string {
    return this.text;
  }
}

/**
 * HTTP/1.1 when the http family is enabled, otherwise RTSP/1.0 when rtsp is.
 * @throws {ConfigurationError} for an empty family list
 */
export function resolveDefaultVersion(families: readonly ProtocolFamily[]): Version {
  if (isFamilyEnabled('http', families)) return Version.HTTP_11;
  if (isFamilyEnabled('rtsp', families)) return Version.RTSP_1;
  throw new ConfigurationError('No protocol family enabled; there is no default version');
}
