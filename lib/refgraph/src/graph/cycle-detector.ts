import type { IFieldIntrospector, ModelSchema, Persistable } from '../types/model';
import { FieldKind } from '../types/model';
import type { Identity, IdentifiedRecord } from '../types/record';
import { isCycleMarker, referencedIdentities } from '../types/record';
import { isReferenceTarget } from '../codec/record-codec';
import type { ObjectArena } from './object-arena';

interface ReferencedObject {
  readonly object: Persistable;
  readonly schema: ModelSchema<Persistable>;
}

/**
 * Reachability checks over reference fields
 */
export class CycleDetector {
  constructor(
    private readonly arena: ObjectArena,
    private readonly introspector: IFieldIntrospector
  ) {}

  /**
   * Depth-first walk from `candidate` over its reference fields.
   * True as soon as an object with the root's arena index is reached.
   * Nodes already in `visited` end their branch, so cycles that do not pass
   * through the root are not reported.
   */
  hasPathBackTo(
    candidate: Persistable,
    candidateSchema: ModelSchema<Persistable>,
    root: Persistable,
    visited: Set<number> = new Set()
  ): boolean {
    const rootIndex = this.arena.indexOf(root);
    const candidateIndex = this.arena.indexOf(candidate);

    if (candidateIndex === rootIndex) {
      return true;
    }
    visited.add(candidateIndex);

    const walk = (node: Persistable, schema: ModelSchema<Persistable>): boolean => {
      for (const child of this.referencedObjects(node, schema)) {
        const index = this.arena.indexOf(child.object);
        if (index === rootIndex) {
          return true;
        }
        if (visited.has(index)) {
          continue;
        }
        visited.add(index);
        if (walk(child.object, child.schema)) {
          return true;
        }
      }
      return false;
    };

    return walk(candidate, candidateSchema);
  }

  /**
   * Root-less check: does the reference subgraph reachable from `record`
   * through `lookup` contain any cycle. Identities `lookup` cannot resolve
   * are leaves.
   */
  recordHasCycle(
    record: IdentifiedRecord,
    lookup: (identity: Identity) => IdentifiedRecord | undefined
  ): boolean {
    const onPath = new Set<Identity>();
    const finished = new Set<Identity>();

    const visit = (current: IdentifiedRecord): boolean => {
      onPath.add(current.identity);
      for (const identity of referencedIdentities(current)) {
        if (onPath.has(identity)) {
          return true;
        }
        if (finished.has(identity)) {
          continue;
        }
        const next = lookup(identity);
        if (next && visit(next)) {
          return true;
        }
      }
      onPath.delete(current.identity);
      finished.add(current.identity);
      return false;
    };

    return visit(record);
  }

  private referencedObjects(
    node: Persistable,
    schema: ModelSchema<Persistable>
  ): ReferencedObject[] {
    const referenced: ReferencedObject[] = [];

    for (const info of this.introspector.fields(node, schema)) {
      const target = info.target;
      if (info.kind !== FieldKind.REFERENCE || !target) {
        continue;
      }
      const values: readonly unknown[] = Array.isArray(info.value) ? info.value : [info.value];
      for (const value of values) {
        // Markers carry an identity only, there is nothing to walk
        if (isReferenceTarget(value) && !isCycleMarker(value)) {
          referenced.push({ object: value, schema: target });
        }
      }
    }

    return referenced;
  }
}
