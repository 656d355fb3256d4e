/**
 * table-data — field codec
 *
 * Converts between a field's declared bit width and its stored form: a
 * network-order (big-endian) byte array of ceil(bitWidth / 8) bytes, padded
 * with zero bits at the most-significant end.
 *
 *   bitWidth = 28, value = 0x0dedbeef
 *
 *     byte:   [0]        [1]        [2]        [3]
 *     bits:   0000 1101  1110 1101  1011 1110  1110 1111
 *             ^^^^
 *             pad bits — always zero
 *
 * Every function here is pure. Inputs are never retained; outputs are fresh
 * copies the caller may keep or mutate.
 */

import { UINT64_LIMIT } from './constants';
import { fail, ok, type Result } from './status';

// ─── Width helpers ────────────────────────────────────────────────────────────

/** Bytes needed to hold `bitWidth` bits. */
export function byteWidth(bitWidth: number): number {
  return Math.ceil(bitWidth / 8);
}

/**
 * Mask of the significant bits in byte 0 of a `bitWidth`-bit encoding.
 * 0xff when the width is a multiple of 8.
 */
function leadingByteMask(bitWidth: number): number {
  const tail = bitWidth & 7;
  return tail === 0 ? 0xff : (1 << tail) - 1;
}

/** True when `bytes` holds no set bits above `bitWidth`. */
function padBitsClear(bitWidth: number, bytes: Uint8Array, size: number): boolean {
  if (size === 0) return true;
  return (bytes[0]! & ~leadingByteMask(bitWidth) & 0xff) === 0;
}

// ─── Scalars (≤ 64 bits of value) ─────────────────────────────────────────────

/**
 * Encode `value` into ceil(bitWidth / 8) network-order bytes.
 *
 * Fails with value_out_of_range when `value` is negative, does not fit in
 * 64 bits, or needs more than `bitWidth` bits. Values are never truncated.
 */
export function encodeScalar(bitWidth: number, value: bigint): Result<Uint8Array> {
  if (value < 0n || value >= UINT64_LIMIT) {
    return fail('value_out_of_range', `value ${value} is not an unsigned 64-bit integer`);
  }
  if (value >> BigInt(bitWidth) !== 0n) {
    return fail(
      'value_out_of_range',
      `value ${value} needs more than ${bitWidth} bit${bitWidth === 1 ? '' : 's'}`,
    );
  }

  const out = new Uint8Array(byteWidth(bitWidth));
  let rest  = value;
  for (let i = out.length - 1; i >= 0 && rest !== 0n; i--) {
    out[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return ok(out);
}

/**
 * Decode ceil(bitWidth / 8) network-order bytes into a uint64.
 *
 * Fails with size_mismatch when the byte count is wrong, and with
 * value_out_of_range when pad bits are set or the value exceeds 64 bits
 * (possible only for widths above 64).
 */
export function decodeScalar(bitWidth: number, bytes: Uint8Array): Result<bigint> {
  const expected = byteWidth(bitWidth);
  if (bytes.length !== expected) {
    return fail(
      'size_mismatch',
      `a ${bitWidth}-bit field takes ${expected} byte${expected === 1 ? '' : 's'}; got ${bytes.length}`,
    );
  }
  if (!padBitsClear(bitWidth, bytes, expected)) {
    return fail('value_out_of_range', `encoding has bits set above bit ${bitWidth - 1}`);
  }

  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  if (value >= UINT64_LIMIT) {
    return fail('value_out_of_range', `${bitWidth}-bit value does not fit in 64 bits`);
  }
  return ok(value);
}

// ─── Byte buffers (any width) ─────────────────────────────────────────────────

/**
 * Validate and copy a caller-supplied network-order buffer.
 *
 * `size` must equal ceil(bitWidth / 8) and the buffer must hold at least
 * `size` bytes; only the first `size` bytes are read. Fails with
 * value_out_of_range when pad bits above `bitWidth` are set.
 */
export function encodeBytes(
  bitWidth: number,
  buffer:   Uint8Array,
  size:     number,
): Result<Uint8Array> {
  const expected = byteWidth(bitWidth);
  if (size !== expected) {
    return fail(
      'size_mismatch',
      `a ${bitWidth}-bit field takes ${expected} byte${expected === 1 ? '' : 's'}; size was ${size}`,
    );
  }
  if (buffer.length < size) {
    return fail('size_mismatch', `size is ${size} but the buffer holds ${buffer.length} bytes`);
  }
  if (!padBitsClear(bitWidth, buffer, size)) {
    return fail('value_out_of_range', `buffer has bits set above bit ${bitWidth - 1}`);
  }
  return ok(buffer.slice(0, size));
}

/**
 * Copy a stored encoding out for a caller that asked for `size` bytes.
 *
 * Fails with size_mismatch when `size` is not ceil(bitWidth / 8) or the
 * stored encoding has a different length.
 */
export function decodeBytes(
  bitWidth: number,
  stored:   Uint8Array,
  size:     number,
): Result<Uint8Array> {
  const expected = byteWidth(bitWidth);
  if (size !== expected) {
    return fail(
      'size_mismatch',
      `a ${bitWidth}-bit field takes ${expected} byte${expected === 1 ? '' : 's'}; size was ${size}`,
    );
  }
  if (stored.length !== expected) {
    return fail('size_mismatch', `stored encoding is ${stored.length} bytes; expected ${expected}`);
  }
  return ok(stored.slice());
}
