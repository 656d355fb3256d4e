/**
 * table-data — field store
 *
 * One value slot per field id, plus two bitsets over field ordinals:
 *
 *   allocated  fields this record was allocated for; fixed for its lifetime
 *   active     allocated fields not currently switched off by a oneof sibling
 *
 * Writes need `allocated`, reads need `active`. A write to an allocated but
 * inactive field is how a oneof member wins its group back; the oneof tracker
 * decides that, the store just records it.
 *
 * Scalar fields (`uint`, `bytes`) are held as their network-order encoding.
 */

import { clearBit, createBitset, forEachSet, setBit, testBit } from './bitset';
import { fail, ok, type Result } from './status';
import type { FieldDescriptor, FieldValue, SchemaProvider } from './types';

export class FieldStore<R> {
  private readonly slots     = new Map<number, FieldValue<R>>();
  private readonly allocated: Uint32Array;
  private readonly active:    Uint32Array;
  /** Field id by ordinal, for the allocated fields only. */
  private readonly idByOrdinal = new Map<number, number>();

  /**
   * @param allocatedIds  Fields this record covers. Every id must exist in
   *                      `schema`; the allocator validates that.
   * @param release       Called once for each container child the store drops.
   */
  constructor(
    readonly schema:          SchemaProvider,
    allocatedIds:             Iterable<number>,
    private readonly release: (child: R) => void,
  ) {
    this.allocated = createBitset(schema.fieldCount);
    this.active    = createBitset(schema.fieldCount);

    for (const id of allocatedIds) {
      const fd = schema.field(id);
      if (fd === undefined) continue;
      setBit(this.allocated, fd.ordinal);
      setBit(this.active,    fd.ordinal);
      this.idByOrdinal.set(fd.ordinal, id);
    }
  }

  // ── Validation ──────────────────────────────────────────────────────────────

  lookup(fieldId: number): Result<FieldDescriptor> {
    const fd = this.schema.field(fieldId);
    if (fd === undefined) {
      return fail('unknown_field', `field ${fieldId} is not in schema '${this.schema.name}'`);
    }
    return ok(fd);
  }

  /** Descriptor of a field this record may write. */
  writable(fieldId: number): Result<FieldDescriptor> {
    const found = this.lookup(fieldId);
    if (!found.ok) return found;
    if (!testBit(this.allocated, found.value.ordinal)) {
      return fail('inactive_field', `field ${fieldId} was not allocated in this record`);
    }
    return found;
  }

  /** Descriptor of a field this record may read. */
  readable(fieldId: number): Result<FieldDescriptor> {
    const found = this.writable(fieldId);
    if (!found.ok) return found;
    if (!testBit(this.active, found.value.ordinal)) {
      return fail('inactive_field', `field ${fieldId} is switched off by another member of its oneof group`);
    }
    return found;
  }

  isActive(fieldId: number): Result<boolean> {
    const found = this.lookup(fieldId);
    if (!found.ok) return found;
    return ok(testBit(this.active, found.value.ordinal));
  }

  isAllocated(fd: FieldDescriptor): boolean {
    return testBit(this.allocated, fd.ordinal);
  }

  // ── Activity ────────────────────────────────────────────────────────────────

  activate(fd: FieldDescriptor): void {
    setBit(this.active, fd.ordinal);
  }

  /** Switch a field off and drop its value. */
  deactivate(fd: FieldDescriptor): void {
    clearBit(this.active, fd.ordinal);
    this.drop(fd.id);
  }

  activeFieldIds(): number[] {
    return this.collect(this.active);
  }

  allocatedFieldIds(): number[] {
    return this.collect(this.allocated);
  }

  // ── Slots ───────────────────────────────────────────────────────────────────

  /** Replace a slot. A container value previously held there is released. */
  write(fd: FieldDescriptor, value: FieldValue<R>): void {
    const previous = this.slots.get(fd.id);
    this.slots.set(fd.id, value);
    if (previous?.kind === 'container') {
      for (const child of previous.value) this.release(child);
    }
  }

  read(fd: FieldDescriptor): Result<FieldValue<R>> {
    const value = this.slots.get(fd.id);
    if (value === undefined) {
      return fail('not_set', `field ${fd.id} '${fd.name}' has not been set`);
    }
    return ok(value);
  }

  /** Every container child held by this store, in no particular order. */
  children(): R[] {
    const out: R[] = [];
    for (const value of this.slots.values()) {
      if (value.kind === 'container') out.push(...value.value);
    }
    return out;
  }

  /** Drop every slot, releasing container children. */
  releaseAll(): void {
    for (const id of [...this.slots.keys()]) this.drop(id);
  }

  // ── Private ─────────────────────────────────────────────────────────────────

  private drop(fieldId: number): void {
    const value = this.slots.get(fieldId);
    if (value === undefined) return;
    this.slots.delete(fieldId);
    if (value.kind === 'container') {
      for (const child of value.value) this.release(child);
    }
  }

  private collect(bs: Uint32Array): number[] {
    const ids: number[] = [];
    forEachSet(bs, this.schema.fieldCount, ordinal => {
      const id = this.idByOrdinal.get(ordinal);
      if (id !== undefined) ids.push(id);
    });
    return ids;
  }
}
