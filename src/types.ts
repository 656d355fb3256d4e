/**
 * table-data — type definitions
 *
 * These types describe the schema a record is allocated against and the
 * values that flow through its accessors. The schema is resolved before any
 * record exists; nothing here parses or compiles one.
 */

// ─── Field Kinds ──────────────────────────────────────────────────────────────

/**
 * Declared kind of a field in a record schema.
 *
 * uint:        Unsigned integer of `bitWidth` bits, any width. Readable and
 *              writable as a uint64 (widths up to 64) or as a network-order
 *              byte array of ceil(bitWidth / 8) bytes (all widths).
 *
 * bytes:       Opaque byte array of `bitWidth` bits. Byte-array accessor only.
 *
 * container:   One or more nested records of `childSchema`. The parent owns
 *              every child it holds.
 *
 * The remaining kinds carry plain values with no declared width.
 */
export type FieldKind =
  | 'uint'
  | 'bytes'
  | 'int_list'
  | 'bool_list'
  | 'string_list'
  | 'uint64_list'
  | 'float'
  | 'bool'
  | 'string'
  | 'container';

/** Tag of a value handed to or returned by a record accessor. */
export type ValueKind =
  | 'uint64'
  | 'bytes'
  | 'int_list'
  | 'bool_list'
  | 'string_list'
  | 'uint64_list'
  | 'float'
  | 'bool'
  | 'string'
  | 'container';

// ─── Values ───────────────────────────────────────────────────────────────────

/**
 * A field value. `R` is the record type carried by container values; the
 * facade instantiates it with TableData.
 */
export type FieldValue<R> =
  | { readonly kind: 'uint64';      readonly value: bigint }
  | { readonly kind: 'bytes';       readonly value: Uint8Array }
  | { readonly kind: 'int_list';    readonly value: readonly number[] }
  | { readonly kind: 'bool_list';   readonly value: readonly boolean[] }
  | { readonly kind: 'string_list'; readonly value: readonly string[] }
  | { readonly kind: 'uint64_list'; readonly value: readonly bigint[] }
  | { readonly kind: 'float';       readonly value: number }
  | { readonly kind: 'bool';        readonly value: boolean }
  | { readonly kind: 'string';      readonly value: string }
  | { readonly kind: 'container';   readonly value: readonly R[] };

// ─── Schema ───────────────────────────────────────────────────────────────────

/**
 * One field in a record schema.
 *
 * ordinal is the field's position in schema declaration order. Activity
 * bitsets use it as the bit index, so it is dense in [0, fieldCount).
 */
export interface FieldDescriptor {
  readonly id:           number;
  readonly name:         string;
  readonly kind:         FieldKind;
  /** Declared width in bits for `uint` and `bytes`; 0 for every other kind. */
  readonly bitWidth:     number;
  readonly ordinal:      number;
  readonly oneofGroup?:  number;
  readonly childSchema?: SchemaProvider;
  /** Present on fields that are parameters of a single action. */
  readonly actionId?:    number;
}

export interface ActionDescriptor {
  readonly id:       number;
  readonly name:     string;
  readonly fieldIds: readonly number[];
}

/**
 * Read-only view of a resolved schema. This is the only thing the record
 * core asks of its schema; buildRecordSchema() returns one, and callers with
 * their own metadata source may implement it directly.
 */
export interface SchemaProvider {
  readonly name:       string;
  readonly fieldCount: number;

  field(fieldId: number): FieldDescriptor | undefined;
  fieldKind(fieldId: number): FieldKind | undefined;
  fieldBitWidth(fieldId: number): number | undefined;
  fieldOneofGroup(fieldId: number): number | undefined;
  containerChildSchema(fieldId: number): SchemaProvider | undefined;

  /** Member ids of a oneof group in schema order; empty for unknown groups. */
  oneofMembers(groupId: number): readonly number[];

  action(actionId: number): ActionDescriptor | undefined;

  /**
   * Ids a full allocation covers: every field without an action, plus the
   * parameters of `actionId` when given. undefined for an unknown action.
   */
  fieldIds(actionId?: number): readonly number[] | undefined;
}

// ─── Parents ──────────────────────────────────────────────────────────────────

/** The owning table, as far as a record needs to know it. */
export interface TableRef {
  readonly name: string;
}

/** The learn-event descriptor that produced a record. */
export interface LearnRef {
  readonly name: string;
}

/** A record belongs to a table or to a learn event, never both. */
export type ParentRef =
  | { readonly kind: 'table'; readonly table: TableRef }
  | { readonly kind: 'learn'; readonly learn: LearnRef };
