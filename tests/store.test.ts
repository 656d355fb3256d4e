import { describe, it, expect } from 'vitest';
import { buildRecordSchema } from '../src/index';
import { FieldStore } from '../src/store';
import type { FieldDescriptor } from '../src/types';

class Child {
  released = 0;
}

const leaf = buildRecordSchema({
  name:   'leaf',
  fields: [{ id: 1, name: 'x', kind: 'bool' }],
});

const schema = buildRecordSchema({
  name:   'store_fields',
  fields: [
    { id: 10, name: 'a',    kind: 'uint', bitWidth: 8 },
    { id: 20, name: 'b',    kind: 'string' },
    { id: 30, name: 'kids', kind: 'container', childSchema: leaf },
    { id: 40, name: 'c',    kind: 'bool' },
  ],
});

function storeOf(ids: number[]): FieldStore<Child> {
  return new FieldStore<Child>(schema, ids, child => {
    child.released++;
  });
}

function descriptor(id: number): FieldDescriptor {
  const fd = schema.field(id);
  if (fd === undefined) throw new Error(`no field ${id}`);
  return fd;
}

describe('FieldStore — validation', () => {
  it('reports unknown_field for ids outside the schema', () => {
    const store = storeOf([10]);
    const out   = store.lookup(99);
    expect(out.ok).toBe(false);
    if (!out.ok) expect(out.code).toBe('unknown_field');
  });

  it('only lets allocated fields be written', () => {
    const store = storeOf([10, 20]);
    expect(store.writable(10).ok).toBe(true);

    const out = store.writable(40);
    expect(out.ok).toBe(false);
    if (!out.ok) expect(out.code).toBe('inactive_field');
  });

  it('stops reads of a deactivated field but still allows writes', () => {
    const store = storeOf([10, 20]);
    store.deactivate(descriptor(20));

    const read = store.readable(20);
    expect(read.ok).toBe(false);
    if (!read.ok) expect(read.code).toBe('inactive_field');
    expect(store.writable(20).ok).toBe(true);
  });

  it('answers isActive for known fields and fails for unknown ones', () => {
    const store = storeOf([10]);
    expect(store.isActive(10)).toEqual({ ok: true, value: true });
    expect(store.isActive(40)).toEqual({ ok: true, value: false });

    const out = store.isActive(99);
    expect(out.ok).toBe(false);
    if (!out.ok) expect(out.code).toBe('unknown_field');
  });
});

describe('FieldStore — activity', () => {
  it('lists active and allocated ids in schema order', () => {
    const store = storeOf([40, 10, 30]);
    store.deactivate(descriptor(30));

    expect(store.allocatedFieldIds()).toEqual([10, 30, 40]);
    expect(store.activeFieldIds()).toEqual([10, 40]);

    store.activate(descriptor(30));
    expect(store.activeFieldIds()).toEqual([10, 30, 40]);
  });

  it('drops the value of a deactivated field', () => {
    const store = storeOf([20]);
    const fd    = descriptor(20);
    store.write(fd, { kind: 'string', value: 'eth0' });
    store.deactivate(fd);
    store.activate(fd);

    const out = store.read(fd);
    expect(out.ok).toBe(false);
    if (!out.ok) expect(out.code).toBe('not_set');
  });

  it('ignores ids the schema does not know', () => {
    const store = storeOf([10, 99]);
    expect(store.allocatedFieldIds()).toEqual([10]);
  });
});

describe('FieldStore — slots', () => {
  it('reports not_set before the first write', () => {
    const store = storeOf([10]);
    const out   = store.read(descriptor(10));
    expect(out.ok).toBe(false);
    if (!out.ok) expect(out.code).toBe('not_set');
  });

  it('returns the last value written', () => {
    const store = storeOf([20]);
    const fd    = descriptor(20);
    store.write(fd, { kind: 'string', value: 'first' });
    store.write(fd, { kind: 'string', value: 'second' });
    expect(store.read(fd)).toEqual({ ok: true, value: { kind: 'string', value: 'second' } });
  });

  it('releases the children a container slot held when it is replaced', () => {
    const store = storeOf([30]);
    const fd    = descriptor(30);
    const old1  = new Child();
    const old2  = new Child();
    const next  = new Child();

    store.write(fd, { kind: 'container', value: [old1, old2] });
    store.write(fd, { kind: 'container', value: [next] });

    expect([old1.released, old2.released, next.released]).toEqual([1, 1, 0]);
    expect(store.children()).toEqual([next]);
  });

  it('releases container children when the field is deactivated', () => {
    const store = storeOf([30]);
    const child = new Child();
    store.write(descriptor(30), { kind: 'container', value: [child] });
    store.deactivate(descriptor(30));
    expect(child.released).toBe(1);
    expect(store.children()).toEqual([]);
  });

  it('releaseAll empties every slot and releases each child once', () => {
    const store = storeOf([10, 30]);
    const child = new Child();
    store.write(descriptor(10), { kind: 'bytes', value: new Uint8Array([7]) });
    store.write(descriptor(30), { kind: 'container', value: [child] });

    store.releaseAll();
    store.releaseAll();

    expect(child.released).toBe(1);
    expect(store.read(descriptor(10)).ok).toBe(false);
  });
});
