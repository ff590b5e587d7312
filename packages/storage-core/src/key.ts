/**
 * Cache key utilities
 *
 * Action IDs and output IDs arrive as lowercase hex strings. Both tiers
 * derive their storage names from them:
 *
 *   disk:   a-{actionId}  (index entry)   o-{outputId}  (blob)
 *   remote: {prefix}/{actionId}
 */

const HEX_REGEX = /^[0-9a-fA-F]+$/;

/**
 * Convert hex string to Uint8Array
 */
export const hexToBytes = (hex: string): Uint8Array => {
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < hex.length; i += 2) {
    bytes[i / 2] = Number.parseInt(hex.slice(i, i + 2), 16);
  }
  return bytes;
};

/**
 * Convert Uint8Array to hex string
 */
export const bytesToHex = (bytes: Uint8Array): string => {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
};

/**
 * Whether a string decodes as hex: non-empty, even length, hex digits only.
 * Index entries read back from disk are checked with this before their
 * output ID is turned into a path.
 */
export const isHexId = (value: string): boolean => {
  return value.length > 0 && value.length % 2 === 0 && HEX_REGEX.test(value);
};

/**
 * File name of the index entry for an action
 */
export const toIndexFileName = (actionId: string): string => `a-${actionId}`;

/**
 * File name of the blob for an output
 */
export const toBlobFileName = (outputId: string): string => `o-${outputId}`;

/**
 * Object key of an action in the remote bucket
 *
 * Example: ("go-cache", "01ab") -> go-cache/01ab
 */
export const toObjectKey = (prefix: string, actionId: string): string => {
  return `${prefix}/${actionId}`;
};
