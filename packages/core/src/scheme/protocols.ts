// packages/core/src/scheme/protocols.ts
import { ENABLED_FAMILIES, isFamilyEnabled, type ProtocolFamily } from '../config/features.js';

/** Known protocol members. The numeric value is also the member's hash tag. */
export const Protocol = {
  Http : 1,
  Https: 2,
  Rtsp : 3,
  Rtsps: 4,
} as const;

export type Protocol = (typeof Protocol)[keyof typeof Protocol];

export interface ProtocolDescriptor {
  readonly protocol: Protocol;
  readonly family  : ProtocolFamily;
  /** canonical lowercase spelling */
  readonly name    : string;
  readonly literal : Uint8Array;
  /** `name` followed by `://` */
  readonly prefix  : Uint8Array;
}

function descriptor(protocol: Protocol, family: ProtocolFamily, name: string): ProtocolDescriptor {
  const enc = new TextEncoder();
  return Object.freeze({
    protocol,
    family,
    name,
    literal: enc.encode(name),
    prefix : enc.encode(`${name}://`),
  });
}

const ALL_PROTOCOLS: readonly ProtocolDescriptor[] = Object.freeze([
  descriptor(Protocol.Http,  'http', 'http'),
  descriptor(Protocol.Https, 'http', 'https'),
  descriptor(Protocol.Rtsp,  'rtsp', 'rtsp'),
  descriptor(Protocol.Rtsps, 'rtsp', 'rtsps'),
]);

export function protocolsFor(families: readonly ProtocolFamily[]): readonly ProtocolDescriptor[] {
  return Object.freeze(ALL_PROTOCOLS.filter(p => isFamilyEnabled(p.family, families)));
}

/** Members recognised by the parsers in this build */
export const KNOWN_PROTOCOLS = protocolsFor(ENABLED_FAMILIES);

export function describeProtocol(p: Protocol): ProtocolDescriptor {
  const d = ALL_PROTOCOLS.find(x => x.protocol === p);
  // the table covers every Protocol value
  if (!d) throw new RangeError(`Unknown protocol tag: ${p}`);
  return d;
}
