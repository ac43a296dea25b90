/**
 * Checksum types understood by the verifier, keyed by the lower-cased name a
 * catalog uses, mapped to the `node:crypto` hash name. Add an entry here to
 * support another algorithm.
 */
export const SUPPORTED_CHECKSUM_ALGORITHMS = {
  md5: 'md5',
} as const satisfies Record<string, string>;

export type ChecksumAlgorithm = keyof typeof SUPPORTED_CHECKSUM_ALGORITHMS;

function isChecksumAlgorithm(name: string): name is ChecksumAlgorithm {
  return Object.hasOwn(SUPPORTED_CHECKSUM_ALGORITHMS, name);
}

/** Case-insensitive lookup; undefined for anything unsupported. */
export function resolveChecksumAlgorithm(
  name: string,
): ChecksumAlgorithm | undefined {
  const normalized = name.trim().toLowerCase();
  return isChecksumAlgorithm(normalized) ? normalized : undefined;
}
