/**
 * table-data — constants
 *
 * Limits of the scalar encoding and the table that decides which accessor
 * kinds a field kind accepts. Changing ACCEPTED_VALUE_KINDS changes the
 * public accessor contract.
 */

import type { FieldKind, ValueKind } from './types';

// ─── Scalar limits ────────────────────────────────────────────────────────────

/** Widest field the uint64 accessor can read or write. */
export const MAX_UINT64_BITS = 64;

/** 2^64. Exclusive upper bound of a uint64 value. */
export const UINT64_LIMIT = 1n << 64n;

/** 2^32. Exclusive upper bound of an int_list element (a 32-bit field id). */
export const INT_LIST_LIMIT = 0x1_0000_0000;

// ─── Accessor table ───────────────────────────────────────────────────────────

/**
 * Value kinds each field kind accepts, in the order get() prefers them.
 *
 * A `uint` field is stored as its network-order encoding, so it answers to
 * both the uint64 accessor (widths up to MAX_UINT64_BITS) and the byte-array
 * accessor. Every other kind has exactly one accessor.
 */
export const ACCEPTED_VALUE_KINDS: Readonly<Record<FieldKind, readonly ValueKind[]>> = {
  uint:        ['uint64', 'bytes'],
  bytes:       ['bytes'],
  int_list:    ['int_list'],
  bool_list:   ['bool_list'],
  string_list: ['string_list'],
  uint64_list: ['uint64_list'],
  float:       ['float'],
  bool:        ['bool'],
  string:      ['string'],
  container:   ['container'],
};

/** Field kinds whose declared bitWidth is meaningful (and required). */
export const SIZED_KINDS: ReadonlySet<FieldKind> = new Set<FieldKind>(['uint', 'bytes']);
