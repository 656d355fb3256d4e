import { describe, it, expect } from 'vitest';
import { allocateTableData, buildRecordSchema, unwrap } from '../src/index';
import { OneofTracker } from '../src/oneof';
import type { FieldDescriptor } from '../src/types';

const A = 10;
const B = 11;
const C = 12;
const PLAIN = 1;
const GROUP = 3;

const schema = buildRecordSchema({
  name:   'oneof_fields',
  fields: [
    { id: PLAIN, name: 'plain', kind: 'uint', bitWidth: 8 },
    { id: A,     name: 'a',     kind: 'uint', bitWidth: 8, oneofGroup: GROUP },
    { id: B,     name: 'b',     kind: 'string',            oneofGroup: GROUP },
    { id: C,     name: 'c',     kind: 'bool',              oneofGroup: GROUP },
  ],
});

function descriptor(id: number): FieldDescriptor {
  const fd = schema.field(id);
  if (fd === undefined) throw new Error(`no field ${id}`);
  return fd;
}

// ─── Tracker ──────────────────────────────────────────────────────────────────

describe('OneofTracker', () => {
  it('returns the allocated siblings of the selected member', () => {
    const tracker = new OneofTracker(schema);
    const off     = tracker.select(descriptor(B), () => true);
    expect(off.map(fd => fd.id)).toEqual([A, C]);
    expect(tracker.selection(GROUP)).toBe(B);
  });

  it('leaves out siblings the record was not allocated for', () => {
    const tracker = new OneofTracker(schema);
    const off     = tracker.select(descriptor(A), fd => fd.id !== C);
    expect(off.map(fd => fd.id)).toEqual([B]);
  });

  it('does nothing for fields outside any group', () => {
    const tracker = new OneofTracker(schema);
    expect(tracker.select(descriptor(PLAIN), () => true)).toEqual([]);
    expect(tracker.selection(GROUP)).toBeUndefined();
  });
});

// ─── Records ──────────────────────────────────────────────────────────────────

describe('oneof groups in a record', () => {
  it('starts a full allocation with every member active', () => {
    const rec = unwrap(allocateTableData(schema));
    expect(rec.activeFieldIds()).toEqual({ ok: true, value: [PLAIN, A, B, C] });
  });

  it('keeps only the member written last active', () => {
    const rec = unwrap(allocateTableData(schema));

    expect(rec.setUint64(A, 1).ok).toBe(true);
    expect(rec.setString(B, 'eth1').ok).toBe(true);
    expect(rec.isActive(A)).toEqual({ ok: true, value: false });
    expect(rec.isActive(B)).toEqual({ ok: true, value: true });

    expect(rec.setBool(C, true).ok).toBe(true);
    expect(rec.activeFieldIds()).toEqual({ ok: true, value: [PLAIN, C] });
  });

  it('reports inactive_field when reading a member that lost its group', () => {
    const rec = unwrap(allocateTableData(schema));
    rec.setUint64(A, 5);
    rec.setBool(C, false);

    const out = rec.getUint64(A);
    expect(out.ok).toBe(false);
    if (!out.ok) expect(out.code).toBe('inactive_field');
  });

  it('lets a switched-off member win its group back by being written', () => {
    const rec = unwrap(allocateTableData(schema));
    rec.setUint64(A, 5);
    rec.setString(B, 'eth1');
    expect(rec.setUint64(A, 6).ok).toBe(true);

    expect(rec.getUint64(A)).toEqual({ ok: true, value: 6n });
    expect(rec.isActive(B)).toEqual({ ok: true, value: false });

    rec.setString(B, 'eth2');
    const old = rec.getUint64(A);
    expect(old.ok).toBe(false);
    if (!old.ok) expect(old.code).toBe('inactive_field');
  });

  it('leaves fields outside the group alone', () => {
    const rec = unwrap(allocateTableData(schema));
    rec.setUint64(PLAIN, 9);
    rec.setUint64(A, 1);
    rec.setBool(C, true);
    expect(rec.getUint64(PLAIN)).toEqual({ ok: true, value: 9n });
  });

  it('does not change the selection when a write fails validation', () => {
    const rec = unwrap(allocateTableData(schema));
    rec.setString(B, 'eth1');

    const out = rec.setUint64(A, 256);
    expect(out.ok).toBe(false);
    if (!out.ok) expect(out.code).toBe('value_out_of_range');

    expect(rec.getString(B)).toEqual({ ok: true, value: 'eth1' });
    expect(rec.isActive(A)).toEqual({ ok: true, value: true });
    expect(rec.oneofSelection(GROUP)).toEqual({ ok: true, value: B });
  });

  it('reports the selected member, or not_set before any write', () => {
    const rec = unwrap(allocateTableData(schema));
    const before = rec.oneofSelection(GROUP);
    expect(before.ok).toBe(false);
    if (!before.ok) expect(before.code).toBe('not_set');

    rec.setBool(C, true);
    expect(rec.oneofSelection(GROUP)).toEqual({ ok: true, value: C });
  });
});

describe('oneof groups in a subset allocation', () => {
  it('accepts the allocated member and rejects the others', () => {
    const rec = unwrap(allocateTableData(schema, { fields: [B] }));

    expect(rec.setString(B, 'eth1').ok).toBe(true);
    expect(rec.isActive(B)).toEqual({ ok: true, value: true });

    const out = rec.setUint64(A, 1);
    expect(out.ok).toBe(false);
    if (!out.ok) expect(out.code).toBe('inactive_field');
    expect(rec.isActive(A)).toEqual({ ok: true, value: false });
  });

  it('keeps the members it includes exclusive among themselves', () => {
    const rec = unwrap(allocateTableData(schema, { fields: [A, C] }));
    rec.setUint64(A, 3);
    rec.setBool(C, true);

    expect(rec.activeFieldIds()).toEqual({ ok: true, value: [C] });
    const out = rec.setString(B, 'eth1');
    expect(out.ok).toBe(false);
    if (!out.ok) expect(out.code).toBe('inactive_field');
  });
});
