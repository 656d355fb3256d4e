/**
 * table-data — container manager
 *
 * Container fields hold records of the container's child schema. The parent
 * owns them:
 *
 *   allocate   builds a fresh child owned by the caller
 *   adopt      moves caller-owned children into the parent; each caller
 *              handle is invalidated and a parent-owned handle takes its place
 *   consume    releases children handed to a set that failed
 *
 * Reads hand out the parent-owned handles as borrowed views. A borrowed view
 * cannot be released or moved; it dies with its parent.
 */

import { fail, ok, type Failure, type Result } from './status';
import type { FieldDescriptor, SchemaProvider } from './types';

/**
 * Handle operations the manager needs from the records it moves around.
 * The record type supplies them; they are not part of its public surface.
 */
export interface Ownership<R> {
  /** False once the handle was moved or released. */
  isLive(record: R): boolean;
  /** True when a parent owns the record. */
  isBorrowed(record: R): boolean;
  /** Outermost record of the ownership chain the record belongs to. */
  root(record: R): R;
  /** Transfer the record's contents to a new handle owned by `owner`. */
  moveInto(record: R, owner: R): R;
  /** Release the record and everything it owns. */
  dispose(record: R): void;
}

/** Build a record of `schema` allocated for `fieldIds`, owned by the caller. */
export type RecordFactory<R> = (schema: SchemaProvider, fieldIds: readonly number[]) => R;

export class ContainerManager<R extends { readonly schema: SchemaProvider }> {
  constructor(
    private readonly ownership: Ownership<R>,
    private readonly factory:   RecordFactory<R>,
  ) {}

  /**
   * Allocate a child record for container field `fd`.
   *
   * @param fields  Restrict the child to these ids of the child schema.
   *                Omitted: every non-action field of the child schema.
   */
  allocate(fd: FieldDescriptor, fields?: readonly number[]): Result<R> {
    const childSchema = fd.childSchema;
    if (fd.kind !== 'container' || childSchema === undefined) {
      return fail('not_a_container', `field ${fd.id} '${fd.name}' is ${fd.kind}, not a container`);
    }

    if (fields === undefined) {
      return ok(this.factory(childSchema, childSchema.fieldIds() ?? []));
    }

    for (const id of fields) {
      if (childSchema.field(id) === undefined) {
        return fail(
          'unknown_field',
          `field ${id} is not in '${childSchema.name}', the child schema of container ${fd.id}`,
        );
      }
    }
    return ok(this.factory(childSchema, [...new Set(fields)]));
  }

  /**
   * Move `children` into `owner` for container field `fd`.
   *
   * Nothing is moved unless every child passes. On failure the caller must
   * still call consume(); ownership is never handed back.
   */
  adopt(owner: R, fd: FieldDescriptor, children: readonly R[]): Result<R[]> {
    const childSchema = fd.childSchema;
    if (fd.kind !== 'container' || childSchema === undefined) {
      return fail('not_a_container', `field ${fd.id} '${fd.name}' is ${fd.kind}, not a container`);
    }

    const rejected = this.check(owner, fd, childSchema, children);
    if (rejected !== undefined) return rejected;

    return ok(children.map(child => this.ownership.moveInto(child, owner)));
  }

  /**
   * Release every child of a failed set that the caller still owned.
   * Children that were already invalid, borrowed, or the receiver's own root
   * are left alone.
   */
  consume(owner: R, children: readonly R[]): void {
    const own  = this.ownership;
    const root = own.root(owner);
    for (const child of new Set(children)) {
      if (own.isLive(child) && !own.isBorrowed(child) && child !== root) own.dispose(child);
    }
  }

  private check(
    owner:       R,
    fd:          FieldDescriptor,
    childSchema: SchemaProvider,
    children:    readonly R[],
  ): Failure | undefined {
    const root = this.ownership.root(owner);
    const seen = new Set<R>();

    for (const [i, child] of children.entries()) {
      if (!this.ownership.isLive(child)) {
        return fail('invalid_handle', `child ${i} for container ${fd.id} was already moved or released`);
      }
      if (this.ownership.isBorrowed(child)) {
        return fail('invalid_handle', `child ${i} for container ${fd.id} is owned by another record`);
      }
      if (child === root) {
        return fail('invalid_handle', `child ${i} for container ${fd.id} would contain itself`);
      }
      if (seen.has(child)) {
        return fail('invalid_handle', `child ${i} for container ${fd.id} appears more than once`);
      }
      seen.add(child);

      if (child.schema !== childSchema) {
        return fail(
          'type_mismatch',
          `child ${i} is a '${child.schema.name}' record; container ${fd.id} holds '${childSchema.name}'`,
        );
      }
    }
    return undefined;
  }
}
