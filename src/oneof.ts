/**
 * table-data — oneof activation tracker
 *
 * Keeps at most one member of each oneof group active per record.
 *
 * A full allocation starts with every member of every group active. The
 * first write to a member selects it: the other allocated members of its
 * group are switched off and lose their values. They stay allocated, so a
 * later write to one of them selects that member instead.
 *
 * A subset allocation only involves the members it includes. With a single
 * member of a group, selection never switches anything off, and the
 * excluded members are rejected by the store before the tracker sees them.
 */

import type { FieldDescriptor, SchemaProvider } from './types';

export class OneofTracker {
  private readonly selected = new Map<number, number>();

  constructor(private readonly schema: SchemaProvider) {}

  /**
   * Record `fd` as its group's selected member.
   *
   * @param isAllocated  Whether a sibling takes part in this record.
   * @returns Descriptors of the allocated siblings to switch off. Empty when
   *          `fd` is not in a oneof group.
   */
  select(
    fd:          FieldDescriptor,
    isAllocated: (sibling: FieldDescriptor) => boolean,
  ): FieldDescriptor[] {
    if (fd.oneofGroup === undefined) return [];

    const off: FieldDescriptor[] = [];
    for (const id of this.schema.oneofMembers(fd.oneofGroup)) {
      if (id === fd.id) continue;
      const sibling = this.schema.field(id);
      if (sibling !== undefined && isAllocated(sibling)) off.push(sibling);
    }

    this.selected.set(fd.oneofGroup, fd.id);
    return off;
  }

  /** Currently selected member of `groupId`; undefined before any member is written. */
  selection(groupId: number): number | undefined {
    return this.selected.get(groupId);
  }
}
