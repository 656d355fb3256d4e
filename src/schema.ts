/**
 * table-data — record schema
 *
 * buildRecordSchema() turns a list of field definitions into a RecordSchema,
 * the SchemaProvider the record core consumes. Ordinals are assigned in
 * declaration order and never change; activity bitsets depend on that.
 *
 * Usage:
 *   const nextHop = buildRecordSchema({
 *     name:   'next_hop',
 *     fields: [
 *       { id: 1, name: 'port',     kind: 'uint', bitWidth: 9 },
 *       { id: 2, name: 'dst_mac',  kind: 'uint', bitWidth: 48 },
 *     ],
 *   });
 *
 *   const route = buildRecordSchema({
 *     name:    'ipv4_route',
 *     actions: [{ id: 100, name: 'forward' }, { id: 200, name: 'drop' }],
 *     fields:  [
 *       { id: 1, name: 'ttl',       kind: 'uint', bitWidth: 8 },
 *       { id: 2, name: 'hops',      kind: 'container', childSchema: nextHop },
 *       { id: 3, name: 'port',      kind: 'uint', bitWidth: 9,  actionId: 100 },
 *       { id: 4, name: 'counter',   kind: 'uint', bitWidth: 64, oneofGroup: 1 },
 *       { id: 5, name: 'counter_id', kind: 'uint', bitWidth: 32, oneofGroup: 1 },
 *     ],
 *   });
 */

import { SIZED_KINDS } from './constants';
import type {
  ActionDescriptor,
  FieldDescriptor,
  FieldKind,
  SchemaProvider,
} from './types';

// ─── Definitions ──────────────────────────────────────────────────────────────

export interface FieldDefinition {
  readonly id:           number;
  readonly name:         string;
  readonly kind:         FieldKind;
  /** Required for `uint` and `bytes`; must be omitted for every other kind. */
  readonly bitWidth?:    number;
  readonly oneofGroup?:  number;
  /** Required for `container`; must be omitted for every other kind. */
  readonly childSchema?: SchemaProvider;
  readonly actionId?:    number;
}

export interface ActionDefinition {
  readonly id:   number;
  readonly name: string;
}

export interface RecordSchemaDefinition {
  readonly name:     string;
  readonly fields:   readonly FieldDefinition[];
  readonly actions?: readonly ActionDefinition[];
}

// ─── RecordSchema ─────────────────────────────────────────────────────────────

export class RecordSchema implements SchemaProvider {
  readonly name:    string;
  readonly fields:  readonly FieldDescriptor[];
  readonly actions: readonly ActionDescriptor[];

  private readonly fieldIndex:  ReadonlyMap<number, FieldDescriptor>;
  private readonly actionIndex: ReadonlyMap<number, ActionDescriptor>;
  private readonly oneofIndex:  ReadonlyMap<number, readonly number[]>;
  private readonly commonIds:   readonly number[];

  /** @internal — use buildRecordSchema() */
  constructor(
    name:    string,
    fields:  readonly FieldDescriptor[],
    actions: readonly ActionDescriptor[],
  ) {
    this.name        = name;
    this.fields      = fields;
    this.actions     = actions;
    this.fieldIndex  = new Map(fields.map(f => [f.id, f]));
    this.actionIndex = new Map(actions.map(a => [a.id, a]));
    this.commonIds   = fields.filter(f => f.actionId === undefined).map(f => f.id);

    const groups = new Map<number, number[]>();
    for (const f of fields) {
      if (f.oneofGroup === undefined) continue;
      const members = groups.get(f.oneofGroup);
      if (members) members.push(f.id);
      else groups.set(f.oneofGroup, [f.id]);
    }
    this.oneofIndex = groups;
  }

  get fieldCount(): number {
    return this.fields.length;
  }

  field(fieldId: number): FieldDescriptor | undefined {
    return this.fieldIndex.get(fieldId);
  }

  fieldKind(fieldId: number): FieldKind | undefined {
    return this.fieldIndex.get(fieldId)?.kind;
  }

  fieldBitWidth(fieldId: number): number | undefined {
    return this.fieldIndex.get(fieldId)?.bitWidth;
  }

  fieldOneofGroup(fieldId: number): number | undefined {
    return this.fieldIndex.get(fieldId)?.oneofGroup;
  }

  containerChildSchema(fieldId: number): SchemaProvider | undefined {
    return this.fieldIndex.get(fieldId)?.childSchema;
  }

  oneofMembers(groupId: number): readonly number[] {
    return this.oneofIndex.get(groupId) ?? [];
  }

  action(actionId: number): ActionDescriptor | undefined {
    return this.actionIndex.get(actionId);
  }

  fieldIds(actionId?: number): readonly number[] | undefined {
    if (actionId === undefined) return this.commonIds;
    const action = this.actionIndex.get(actionId);
    if (action === undefined) return undefined;
    return this.fields
      .filter(f => f.actionId === undefined || f.actionId === actionId)
      .map(f => f.id);
  }
}

// ─── Builder ──────────────────────────────────────────────────────────────────

/**
 * Resolve a schema definition.
 *
 * Field ids are unique across the whole schema, action parameters included,
 * so a field id alone identifies a slot in any record of this schema.
 *
 * @throws TypeError on duplicate ids or names, a missing or stray bitWidth,
 *         a missing or stray childSchema, or a reference to an undeclared action.
 */
export function buildRecordSchema(definition: RecordSchemaDefinition): RecordSchema {
  const { name } = definition;
  const actionDefs = definition.actions ?? [];

  const actionIds = new Set<number>();
  for (const a of actionDefs) {
    if (actionIds.has(a.id)) {
      throw new TypeError(`buildRecordSchema(${name}): duplicate action id ${a.id}.`);
    }
    actionIds.add(a.id);
  }

  const seenIds   = new Set<number>();
  const seenNames = new Set<string>();
  const resolved: FieldDescriptor[] = [];

  for (const f of definition.fields) {
    const where = `buildRecordSchema(${name}): field ${f.id} '${f.name}'`;

    if (!Number.isInteger(f.id) || f.id < 0) {
      throw new TypeError(`${where} has an invalid id; ids are non-negative integers.`);
    }
    if (seenIds.has(f.id)) {
      throw new TypeError(`${where} reuses an id. Field ids must be unique within a schema.`);
    }
    if (seenNames.has(f.name)) {
      throw new TypeError(`${where} reuses a name. Field names must be unique within a schema.`);
    }
    seenIds.add(f.id);
    seenNames.add(f.name);

    if (SIZED_KINDS.has(f.kind)) {
      if (f.bitWidth === undefined || !Number.isInteger(f.bitWidth) || f.bitWidth < 1) {
        throw new TypeError(`${where} (${f.kind}) needs a bitWidth of at least 1.`);
      }
    } else if (f.bitWidth !== undefined) {
      throw new TypeError(`${where} (${f.kind}) does not take a bitWidth.`);
    }

    if (f.kind === 'container' && f.childSchema === undefined) {
      throw new TypeError(`${where} is a container and needs a childSchema.`);
    }
    if (f.kind !== 'container' && f.childSchema !== undefined) {
      throw new TypeError(`${where} (${f.kind}) is not a container; childSchema is not allowed.`);
    }

    if (f.actionId !== undefined && !actionIds.has(f.actionId)) {
      throw new TypeError(`${where} refers to undeclared action ${f.actionId}.`);
    }

    resolved.push({
      id:       f.id,
      name:     f.name,
      kind:     f.kind,
      bitWidth: f.bitWidth ?? 0,
      ordinal:  resolved.length,
      ...(f.oneofGroup  !== undefined ? { oneofGroup:  f.oneofGroup }  : {}),
      ...(f.childSchema !== undefined ? { childSchema: f.childSchema } : {}),
      ...(f.actionId    !== undefined ? { actionId:    f.actionId }    : {}),
    });
  }

  const actions: ActionDescriptor[] = actionDefs.map(a => ({
    id:       a.id,
    name:     a.name,
    fieldIds: resolved.filter(f => f.actionId === a.id).map(f => f.id),
  }));

  return new RecordSchema(name, resolved, actions);
}
