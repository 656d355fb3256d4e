/**
 * table-data — TableData
 *
 * A record of field values addressed by field id, allocated against a
 * runtime schema for a full or partial field set. Owning tables and learn
 * handlers create one with allocateTableData(), populate or read it through
 * the accessors below, and release it when done.
 *
 * Every operation returns a Status or Result; nothing throws. Validation runs
 * in a fixed order and stops at the first failure:
 *
 *   handle → unknown_field → inactive_field → type_mismatch
 *          → value_out_of_range / size_mismatch → commit
 *
 * A failed write leaves the record untouched, with one exception: a failed
 * setContainer() releases the children it was given.
 *
 * Ownership:
 *
 *   const child = unwrap(entry.allocateContainer(HOPS));
 *   child.setUint64(PORT, 7);
 *   entry.setContainer(HOPS, [child]);   // child is now invalid_handle
 *   const [hop] = unwrap(entry.getContainer(HOPS));
 *   hop.getUint64(PORT);                 // { ok: true, value: 7n }
 *   hop.release();                       // invalid_handle: entry owns it
 *   entry.release();                     // releases hop too
 *
 * Not synchronized. One caller populates a record at a time; distinct
 * records share nothing but their schema.
 */

import { byteWidth, decodeBytes, decodeScalar, encodeBytes, encodeScalar } from './codec';
import { ACCEPTED_VALUE_KINDS, INT_LIST_LIMIT, MAX_UINT64_BITS, UINT64_LIMIT } from './constants';
import { ContainerManager, type Ownership } from './container';
import { OneofTracker } from './oneof';
import { fail, ok, OK, type Failure, type Result, type Status } from './status';
import { FieldStore } from './store';
import type {
  FieldDescriptor,
  FieldValue,
  LearnRef,
  ParentRef,
  SchemaProvider,
  TableRef,
  ValueKind,
} from './types';

// ─── Public types ─────────────────────────────────────────────────────────────

export type TableDataValue = FieldValue<TableData>;

export interface AllocateOptions {
  /** Allocate only these fields. Omitted: every field of the allocation. */
  readonly fields?:   readonly number[];
  /** Action whose parameters the record carries. */
  readonly actionId?: number;
  readonly parent?:   ParentRef;
}

// ─── Internal types ───────────────────────────────────────────────────────────

/** Weak link to the owner; a record never keeps its table or learn event alive. */
type ParentLink =
  | { readonly kind: 'table'; readonly ref: WeakRef<TableRef> }
  | { readonly kind: 'learn'; readonly ref: WeakRef<LearnRef> };

/**
 * Everything a move hands from one handle to the next. `parent` follows the
 * tree the record sits in, so a move rewrites it for the whole subtree.
 */
interface RecordState {
  readonly schema:   SchemaProvider;
  readonly store:    FieldStore<TableData>;
  readonly oneofs:   OneofTracker;
  parent:            ParentLink | undefined;
  readonly actionId: number | undefined;
}

type HandleState = 'live' | 'moved' | 'released';

/** Values a setter hands to encode(); setUint64 also takes plain numbers. */
type Incoming =
  | Exclude<TableDataValue, { kind: 'container' }>
  | { readonly kind: 'uint64'; readonly value: number };

function linkParent(parent: ParentRef | undefined): ParentLink | undefined {
  if (parent === undefined) return undefined;
  return parent.kind === 'table'
    ? { kind: 'table', ref: new WeakRef(parent.table) }
    : { kind: 'learn', ref: new WeakRef(parent.learn) };
}

// ─── TableData ────────────────────────────────────────────────────────────────

export class TableData {
  /**
   * Handle operations for the container manager. They live here rather than
   * on the instance so a borrowed view offers no way to release or move itself.
   */
  private static readonly ownership: Ownership<TableData> = {
    isLive:     record => record.handle === 'live',
    isBorrowed: record => record.owner !== undefined,

    root(record) {
      let top = record;
      while (top.owner !== undefined) top = top.owner;
      return top;
    },

    /** Hand the record's contents to a new handle owned by `owner`; the old handle dies. */
    moveInto(record, owner) {
      const moved = new TableData(record.state, owner);
      record.handle = 'moved';
      for (const child of record.state.store.children()) child.owner = moved;
      TableData.relink(record.state, owner.state.parent);
      return moved;
    },

    dispose(record) {
      if (record.handle !== 'live') return;
      record.handle = 'released';
      record.state.store.releaseAll();
    },
  };

  private readonly state:      RecordState;
  private readonly containers: ContainerManager<TableData>;
  private handle: HandleState = 'live';
  /** Record whose container holds this one; undefined while the caller owns it. */
  private owner:  TableData | undefined;

  private constructor(state: RecordState, owner?: TableData) {
    this.state      = state;
    this.owner      = owner;
    this.containers = new ContainerManager<TableData>(
      TableData.ownership,
      (schema, fieldIds) => TableData.create(schema, fieldIds, this.state.parent, undefined),
    );
  }

  /**
   * Allocate a record of `schema`.
   *
   * Without `actionId` the record covers the schema's non-action fields; with
   * it, those plus the action's parameters. `fields` narrows that set further.
   */
  static allocate(schema: SchemaProvider, options: AllocateOptions = {}): Result<TableData> {
    const { actionId, fields, parent } = options;

    const base = schema.fieldIds(actionId);
    if (base === undefined) {
      return fail('unknown_action', `action ${actionId} is not in schema '${schema.name}'`);
    }

    let ids = base;
    if (fields !== undefined) {
      const allowed = new Set(base);
      for (const id of fields) {
        if (schema.field(id) === undefined) {
          return fail('unknown_field', `field ${id} is not in schema '${schema.name}'`);
        }
        if (!allowed.has(id)) {
          const scope = actionId === undefined ? 'the non-action fields' : `action ${actionId}`;
          return fail('inactive_field', `field ${id} is not part of ${scope}`);
        }
      }
      ids = [...new Set(fields)];
    }

    return ok(TableData.create(schema, ids, linkParent(parent), actionId));
  }

  private static create(
    schema:   SchemaProvider,
    fieldIds: readonly number[],
    parent:   ParentLink | undefined,
    actionId: number | undefined,
  ): TableData {
    return new TableData({
      schema,
      store:  new FieldStore<TableData>(schema, fieldIds, child => TableData.ownership.dispose(child)),
      oneofs: new OneofTracker(schema),
      parent,
      actionId,
    });
  }

  get schema(): SchemaProvider {
    return this.state.schema;
  }

  // ── Generic accessors ───────────────────────────────────────────────────────

  /**
   * Write any value. Byte arrays are taken at their full length; use
   * setBytes() to pass an explicit size.
   */
  set(fieldId: number, value: TableDataValue): Status {
    if (value.kind === 'container') return this.setContainer(fieldId, value.value);
    return this.write(fieldId, value);
  }

  /**
   * Read a value in its natural form: uint64 for `uint` fields up to 64 bits,
   * bytes for wider `uint` and all `bytes` fields.
   */
  get(fieldId: number): Result<TableDataValue> {
    const found = this.readable(fieldId);
    if (!found.ok) return found;
    const fd = found.value;

    const slot = this.state.store.read(fd);
    if (!slot.ok) return slot;
    const stored = slot.value;

    switch (stored.kind) {
      case 'bytes': {
        if (fd.kind === 'uint' && fd.bitWidth <= MAX_UINT64_BITS) {
          const decoded = decodeScalar(fd.bitWidth, stored.value);
          return decoded.ok ? ok({ kind: 'uint64', value: decoded.value }) : decoded;
        }
        return ok({ kind: 'bytes', value: stored.value.slice() });
      }
      case 'int_list':    return ok({ kind: 'int_list',    value: [...stored.value] });
      case 'bool_list':   return ok({ kind: 'bool_list',   value: [...stored.value] });
      case 'string_list': return ok({ kind: 'string_list', value: [...stored.value] });
      case 'uint64_list': return ok({ kind: 'uint64_list', value: [...stored.value] });
      case 'container':   return ok({ kind: 'container',   value: [...stored.value] });
      default:            return ok(stored);
    }
  }

  // ── Scalars ─────────────────────────────────────────────────────────────────

  /**
   * Set a `uint` field of at most 64 bits. The value must fit the declared
   * width: 14 on a 3-bit field is value_out_of_range, not 6.
   */
  setUint64(fieldId: number, value: bigint | number): Status {
    return this.write(fieldId, { kind: 'uint64', value });
  }

  getUint64(fieldId: number): Result<bigint> {
    const slot = this.readAs(fieldId, 'uint64');
    if (!slot.ok) return slot;
    const { fd, stored } = slot.value;
    if (stored.kind !== 'bytes') return mismatch(fd, 'uint64');
    return decodeScalar(fd.bitWidth, stored.value);
  }

  /**
   * Set a `uint` or `bytes` field from network-order bytes with zero padding
   * in the most-significant bits. `size` must be ceil(bitWidth / 8): a 28-bit
   * value 0xdedbeef is passed as [0x0d, 0xed, 0xbe, 0xef] with size 4.
   */
  setBytes(fieldId: number, value: Uint8Array, size: number = value.length): Status {
    return this.write(fieldId, { kind: 'bytes', value }, size);
  }

  /** Read a `uint` or `bytes` field as ceil(bitWidth / 8) network-order bytes. */
  getBytes(fieldId: number, size: number): Result<Uint8Array> {
    const found = this.readable(fieldId);
    if (!found.ok) return found;
    const fd = found.value;
    if (!accepts(fd, 'bytes')) return mismatch(fd, 'bytes');

    const expected = byteWidth(fd.bitWidth);
    if (size !== expected) {
      return fail('size_mismatch', `field ${fd.id} takes ${expected} bytes; size was ${size}`);
    }

    const slot = this.state.store.read(fd);
    if (!slot.ok) return slot;
    if (slot.value.kind !== 'bytes') return mismatch(fd, 'bytes');
    return decodeBytes(fd.bitWidth, slot.value.value, size);
  }

  setFloat(fieldId: number, value: number): Status {
    return this.write(fieldId, { kind: 'float', value });
  }

  /** Floats are held at single precision. */
  getFloat(fieldId: number): Result<number> {
    const slot = this.readAs(fieldId, 'float');
    if (!slot.ok) return slot;
    const { fd, stored } = slot.value;
    return stored.kind === 'float' ? ok(stored.value) : mismatch(fd, 'float');
  }

  setBool(fieldId: number, value: boolean): Status {
    return this.write(fieldId, { kind: 'bool', value });
  }

  getBool(fieldId: number): Result<boolean> {
    const slot = this.readAs(fieldId, 'bool');
    if (!slot.ok) return slot;
    const { fd, stored } = slot.value;
    return stored.kind === 'bool' ? ok(stored.value) : mismatch(fd, 'bool');
  }

  setString(fieldId: number, value: string): Status {
    return this.write(fieldId, { kind: 'string', value });
  }

  getString(fieldId: number): Result<string> {
    const slot = this.readAs(fieldId, 'string');
    if (!slot.ok) return slot;
    const { fd, stored } = slot.value;
    return stored.kind === 'string' ? ok(stored.value) : mismatch(fd, 'string');
  }

  // ── Lists ───────────────────────────────────────────────────────────────────

  /** Elements are 32-bit ids: integers in [0, 2^32). */
  setIntList(fieldId: number, value: readonly number[]): Status {
    return this.write(fieldId, { kind: 'int_list', value });
  }

  getIntList(fieldId: number): Result<number[]> {
    const slot = this.readAs(fieldId, 'int_list');
    if (!slot.ok) return slot;
    const { fd, stored } = slot.value;
    return stored.kind === 'int_list' ? ok([...stored.value]) : mismatch(fd, 'int_list');
  }

  setBoolList(fieldId: number, value: readonly boolean[]): Status {
    return this.write(fieldId, { kind: 'bool_list', value });
  }

  getBoolList(fieldId: number): Result<boolean[]> {
    const slot = this.readAs(fieldId, 'bool_list');
    if (!slot.ok) return slot;
    const { fd, stored } = slot.value;
    return stored.kind === 'bool_list' ? ok([...stored.value]) : mismatch(fd, 'bool_list');
  }

  setStringList(fieldId: number, value: readonly string[]): Status {
    return this.write(fieldId, { kind: 'string_list', value });
  }

  getStringList(fieldId: number): Result<string[]> {
    const slot = this.readAs(fieldId, 'string_list');
    if (!slot.ok) return slot;
    const { fd, stored } = slot.value;
    return stored.kind === 'string_list' ? ok([...stored.value]) : mismatch(fd, 'string_list');
  }

  setUint64List(fieldId: number, value: readonly bigint[]): Status {
    return this.write(fieldId, { kind: 'uint64_list', value });
  }

  getUint64List(fieldId: number): Result<bigint[]> {
    const slot = this.readAs(fieldId, 'uint64_list');
    if (!slot.ok) return slot;
    const { fd, stored } = slot.value;
    return stored.kind === 'uint64_list' ? ok([...stored.value]) : mismatch(fd, 'uint64_list');
  }

  // ── Containers ──────────────────────────────────────────────────────────────

  /**
   * Move `children` into container field `fieldId`, replacing (and
   * releasing) whatever it held.
   *
   * On success the handles passed in are invalid; read the children back
   * with getContainer(). On failure the children are released: allocate
   * them again rather than reusing them.
   */
  setContainer(fieldId: number, children: readonly TableData[]): Status {
    const result = this.adoptChildren(fieldId, children);
    if (!result.ok) this.containers.consume(this, children);
    return result;
  }

  /** Borrowed views of the children. They stay valid while this record lives. */
  getContainer(fieldId: number): Result<readonly TableData[]> {
    const slot = this.readAs(fieldId, 'container');
    if (!slot.ok) return slot;
    const { fd, stored } = slot.value;
    return stored.kind === 'container' ? ok([...stored.value]) : mismatch(fd, 'container');
  }

  /**
   * Allocate a record for container field `containerId`, owned by the caller
   * until it is handed over with setContainer().
   *
   * The container must be allocated in this record. A member switched off by
   * a oneof sibling still qualifies: setting it is how it wins its group back.
   *
   * @param fields  Allocate the child for these child-schema fields only,
   *                for modify or read requests that touch part of it.
   */
  allocateContainer(containerId: number, fields?: readonly number[]): Result<TableData> {
    const invalid = this.guard();
    if (invalid) return invalid;
    const found = this.state.store.writable(containerId);
    if (!found.ok) return found;
    return this.containers.allocate(found.value, fields);
  }

  // ── Activity ────────────────────────────────────────────────────────────────

  /**
   * Whether a field is active: allocated for this record and not switched
   * off by another member of its oneof group.
   */
  isActive(fieldId: number): Result<boolean> {
    const invalid = this.guard();
    if (invalid) return invalid;
    return this.state.store.isActive(fieldId);
  }

  /** Active field ids in schema order. */
  activeFieldIds(): Result<number[]> {
    const invalid = this.guard();
    if (invalid) return invalid;
    return ok(this.state.store.activeFieldIds());
  }

  /** Member of oneof group `groupId` written last; not_set before any write. */
  oneofSelection(groupId: number): Result<number> {
    const invalid = this.guard();
    if (invalid) return invalid;
    const selected = this.state.oneofs.selection(groupId);
    if (selected === undefined) {
      return fail('not_set', `no member of oneof group ${groupId} has been set`);
    }
    return ok(selected);
  }

  // ── Identity ────────────────────────────────────────────────────────────────

  actionIdGet(): Result<number> {
    const invalid = this.guard();
    if (invalid) return invalid;
    if (this.state.actionId === undefined) {
      return fail('no_action', `record of '${this.state.schema.name}' was not allocated for an action`);
    }
    return ok(this.state.actionId);
  }

  getParentTable(): Result<TableRef> {
    const invalid = this.guard();
    if (invalid) return invalid;
    const link = this.state.parent;
    const table = link?.kind === 'table' ? link.ref.deref() : undefined;
    return table === undefined ? fail('no_parent', 'record has no parent table') : ok(table);
  }

  getParentLearn(): Result<LearnRef> {
    const invalid = this.guard();
    if (invalid) return invalid;
    const link = this.state.parent;
    const learn = link?.kind === 'learn' ? link.ref.deref() : undefined;
    return learn === undefined ? fail('no_parent', 'record has no parent learn event') : ok(learn);
  }

  // ── Lifetime ────────────────────────────────────────────────────────────────

  /**
   * Release this record and every child it owns. Only the caller-owned
   * top of a tree can be released; children go with their parent.
   */
  release(): Status {
    const invalid = this.guard();
    if (invalid) return invalid;
    if (this.owner !== undefined) {
      return fail('invalid_handle', 'record is owned by its parent container and is released with it');
    }
    TableData.ownership.dispose(this);
    return OK;
  }

  // ── Ownership ───────────────────────────────────────────────────────────────

  /** Give a record and everything below it the parent link of its new tree. */
  private static relink(state: RecordState, parent: ParentLink | undefined): void {
    state.parent = parent;
    for (const child of state.store.children()) TableData.relink(child.state, parent);
  }

  // ── Private ─────────────────────────────────────────────────────────────────

  private guard(): Failure | undefined {
    switch (this.handle) {
      case 'live':
        return undefined;
      case 'moved':
        return fail('invalid_handle', 'record was moved into a container; use the handle getContainer() returns');
      case 'released':
        return fail('invalid_handle', 'record was released');
    }
  }

  private readable(fieldId: number): Result<FieldDescriptor> {
    const invalid = this.guard();
    if (invalid) return invalid;
    return this.state.store.readable(fieldId);
  }

  private writable(fieldId: number): Result<FieldDescriptor> {
    const invalid = this.guard();
    if (invalid) return invalid;
    return this.state.store.writable(fieldId);
  }

  /** Readable field, checked against accessor `kind`, with its stored value. */
  private readAs(
    fieldId: number,
    kind:    ValueKind,
  ): Result<{ fd: FieldDescriptor; stored: TableDataValue }> {
    const found = this.readable(fieldId);
    if (!found.ok) return found;
    const fd = found.value;
    if (!accepts(fd, kind)) return mismatch(fd, kind);

    const slot = this.state.store.read(fd);
    if (!slot.ok) return slot;
    return ok({ fd, stored: slot.value });
  }

  private write(fieldId: number, value: Incoming, size?: number): Status {
    const found = this.writable(fieldId);
    if (!found.ok) return found;
    const fd = found.value;

    const encoded = encode(fd, value, size);
    if (!encoded.ok) return encoded;

    this.commit(fd, encoded.value);
    return OK;
  }

  private adoptChildren(fieldId: number, children: readonly TableData[]): Status {
    const found = this.writable(fieldId);
    if (!found.ok) return found;
    const fd = found.value;
    if (!accepts(fd, 'container')) return mismatch(fd, 'container');

    const owned = this.containers.adopt(this, fd, children);
    if (!owned.ok) return owned;

    this.commit(fd, { kind: 'container', value: owned.value });
    return OK;
  }

  /** Select `fd` within its oneof group, then store the value. */
  private commit(fd: FieldDescriptor, value: TableDataValue): void {
    const { store, oneofs } = this.state;
    for (const sibling of oneofs.select(fd, s => store.isAllocated(s))) {
      store.deactivate(sibling);
    }
    store.activate(fd);
    store.write(fd, value);
  }
}

// ─── Allocation ───────────────────────────────────────────────────────────────

/** Allocate a record of `schema`; see TableData.allocate(). */
export function allocateTableData(
  schema:  SchemaProvider,
  options: AllocateOptions = {},
): Result<TableData> {
  return TableData.allocate(schema, options);
}

// ─── Value checks ─────────────────────────────────────────────────────────────
//
// The compiler already rules out most of these; the runtime checks are for
// values built without it (parsed input, untyped callers).

function accepts(fd: FieldDescriptor, kind: ValueKind): boolean {
  if (!ACCEPTED_VALUE_KINDS[fd.kind].includes(kind)) return false;
  return kind !== 'uint64' || fd.bitWidth <= MAX_UINT64_BITS;
}

function mismatch(fd: FieldDescriptor, kind: ValueKind): Failure {
  const detail = fd.kind === 'uint' && kind === 'uint64'
    ? `is ${fd.bitWidth} bits wide; use the byte-array accessor`
    : `is ${fd.kind}`;
  return fail('type_mismatch', `field ${fd.id} '${fd.name}' ${detail}; cannot use it as ${kind}`);
}

function outOfRange(fd: FieldDescriptor, message: string): Failure {
  return fail('value_out_of_range', `field ${fd.id} '${fd.name}': ${message}`);
}

const isNumber  = (e: unknown): e is number  => typeof e === 'number';
const isBoolean = (e: unknown): e is boolean => typeof e === 'boolean';
const isString  = (e: unknown): e is string  => typeof e === 'string';
const isBigint  = (e: unknown): e is bigint  => typeof e === 'bigint';

function isListOf<T>(list: unknown, isElement: (e: unknown) => e is T): list is readonly T[] {
  return Array.isArray(list) && list.every(isElement);
}

/** Validate `value` against `fd` and turn it into its stored form. */
function encode(fd: FieldDescriptor, value: Incoming, size?: number): Result<TableDataValue> {
  if (!accepts(fd, value.kind)) return mismatch(fd, value.kind);

  switch (value.kind) {
    case 'uint64': {
      const v = value.value;
      let big: bigint;
      if (typeof v === 'bigint') {
        big = v;
      } else if (typeof v === 'number') {
        if (!Number.isSafeInteger(v)) return outOfRange(fd, `${v} is not a safe integer`);
        big = BigInt(v);
      } else {
        return mismatch(fd, 'uint64');
      }
      const bytes = encodeScalar(fd.bitWidth, big);
      return bytes.ok ? ok({ kind: 'bytes', value: bytes.value }) : bytes;
    }

    case 'bytes': {
      if (!(value.value instanceof Uint8Array)) return mismatch(fd, 'bytes');
      const bytes = encodeBytes(fd.bitWidth, value.value, size ?? value.value.length);
      return bytes.ok ? ok({ kind: 'bytes', value: bytes.value }) : bytes;
    }

    case 'int_list': {
      if (!isListOf(value.value, isNumber)) return mismatch(fd, 'int_list');
      const bad = value.value.find(v => !Number.isInteger(v) || v < 0 || v >= INT_LIST_LIMIT);
      if (bad !== undefined) return outOfRange(fd, `${bad} is not a 32-bit unsigned integer`);
      return ok({ kind: 'int_list', value: [...value.value] });
    }

    case 'bool_list':
      if (!isListOf(value.value, isBoolean)) return mismatch(fd, 'bool_list');
      return ok({ kind: 'bool_list', value: [...value.value] });

    case 'string_list':
      if (!isListOf(value.value, isString)) return mismatch(fd, 'string_list');
      return ok({ kind: 'string_list', value: [...value.value] });

    case 'uint64_list': {
      if (!isListOf(value.value, isBigint)) return mismatch(fd, 'uint64_list');
      const bad = value.value.find(v => v < 0n || v >= UINT64_LIMIT);
      if (bad !== undefined) return outOfRange(fd, `${bad} is not an unsigned 64-bit integer`);
      return ok({ kind: 'uint64_list', value: [...value.value] });
    }

    case 'float':
      if (typeof value.value !== 'number') return mismatch(fd, 'float');
      return ok({ kind: 'float', value: Math.fround(value.value) });

    case 'bool':
      if (typeof value.value !== 'boolean') return mismatch(fd, 'bool');
      return ok({ kind: 'bool', value: value.value });

    case 'string':
      if (typeof value.value !== 'string') return mismatch(fd, 'string');
      return ok({ kind: 'string', value: value.value });
  }
}
