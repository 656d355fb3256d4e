// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  FieldKind,
  ValueKind,
  FieldValue,
  FieldDescriptor,
  ActionDescriptor,
  SchemaProvider,
  TableRef,
  LearnRef,
  ParentRef,
} from './types';

// ─── Status ───────────────────────────────────────────────────────────────────
export { OK, ok, fail, unwrap, RecordError } from './status';
export type { StatusCode, Status, Result, Failure } from './status';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  MAX_UINT64_BITS,
  UINT64_LIMIT,
  INT_LIST_LIMIT,
  ACCEPTED_VALUE_KINDS,
} from './constants';

// ─── Codec ────────────────────────────────────────────────────────────────────
export {
  byteWidth,
  encodeScalar,
  decodeScalar,
  encodeBytes,
  decodeBytes,
} from './codec';

// ─── Schema ───────────────────────────────────────────────────────────────────
export { buildRecordSchema, RecordSchema } from './schema';
export type {
  FieldDefinition,
  ActionDefinition,
  RecordSchemaDefinition,
} from './schema';

// ─── Record ───────────────────────────────────────────────────────────────────
export { TableData, allocateTableData } from './table-data';
export type { TableDataValue, AllocateOptions } from './table-data';
