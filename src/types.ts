/**
 * Result of parsing a prefix of `input`.
 * `remainder` is always a subarray of the buffer that was parsed, so its
 * `byteOffset` locates it within the whole message.
 */
interface Parsed<T> {
  data: T;
  remainder: Uint8Array;
}

export type { Parsed };
