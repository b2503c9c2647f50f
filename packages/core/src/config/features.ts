// packages/core/src/config/features.ts

export const PROTOCOL_FAMILIES = ['http', 'rtsp'] as const;
export type ProtocolFamily = (typeof PROTOCOL_FAMILIES)[number];

/**
 * Protocol families compiled into this build. Known protocols and version
 * tags of a family that is not listed here are never produced by parsing,
 * listed by `Version.values()` or chosen as a default.
 */
export const ENABLED_FAMILIES: readonly ProtocolFamily[] = Object.freeze(['http', 'rtsp']);

export function isFamilyEnabled(
  family  : ProtocolFamily,
  families: readonly ProtocolFamily[] = ENABLED_FAMILIES,
): boolean {
  return families.includes(family);
}
