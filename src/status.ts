/**
 * table-data — operation status
 *
 * Record operations report failure by value. A failed call leaves the record
 * exactly as it was (the one exception is a failed container set, which
 * consumes the children it was given).
 */

// ─── Codes ────────────────────────────────────────────────────────────────────

/**
 * unknown_field       field id is not in the schema
 * inactive_field      field id is in the schema but not active in this record
 * type_mismatch       accessor kind does not match the field's declared kind
 * value_out_of_range  value does not fit the field's declared width
 * size_mismatch       byte count differs from ceil(bitWidth / 8)
 * not_a_container     container operation on a non-container field
 * not_set             read of a field that was never written
 * no_parent           record has no parent of the requested kind
 * no_action           record was not allocated for an action
 * unknown_action      action id is not in the schema
 * invalid_handle      record was moved into a parent, released, or is
 *                     owned by a parent and cannot be released directly
 */
export type StatusCode =
  | 'unknown_field'
  | 'inactive_field'
  | 'type_mismatch'
  | 'value_out_of_range'
  | 'size_mismatch'
  | 'not_a_container'
  | 'not_set'
  | 'no_parent'
  | 'no_action'
  | 'unknown_action'
  | 'invalid_handle';

export interface Failure {
  readonly ok:      false;
  readonly code:    StatusCode;
  readonly message: string;
}

export type Status    = { readonly ok: true } | Failure;
export type Result<T> = { readonly ok: true; readonly value: T } | Failure;

export const OK: Status = { ok: true };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail(code: StatusCode, message: string): Failure {
  return { ok: false, code, message };
}

// ─── Errors ───────────────────────────────────────────────────────────────────

/** Thrown by unwrap() for callers that would rather handle failures as exceptions. */
export class RecordError extends Error {
  readonly code: StatusCode;

  constructor(code: StatusCode, message: string) {
    super(message);
    this.name = 'RecordError';
    this.code = code;
  }
}

/**
 * Return the value of a successful result.
 *
 * @throws RecordError carrying the failure's code and message.
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new RecordError(result.code, result.message);
  return result.value;
}
