import type { AggregateDefinition, EventProperties } from './types.js';

/**
 * A payload bound to its kind.
 *
 * This is the only view of a payload the aggregation engine ever gets:
 * it can merge two of them and export one, without knowing the concrete
 * payload type.
 */
export interface BoundAggregate {
  readonly tag: string;
  readonly name: string;
  /**
   * Merges `other` into a new bound aggregate.
   * Returns `null` when `other` was not bound by the same kind, or when
   * either side has already been exported.
   */
  tryMerge(other: BoundAggregate): BoundAggregate | null;
  /** Drains the payload. Single use: returns `null` on later calls. */
  export(): EventProperties | null;
}

export interface AggregateKind<P extends object> extends AggregateDefinition<P> {
  bind(payload: P): BoundAggregate;
}

/**
 * Defines an event kind.
 *
 * Each kind owns a private registry from bound handle to typed payload.
 * `tryMerge` resolves both operands through that registry, so a handle
 * from another kind simply is not found there; no cast is involved.
 */
export function defineAggregateKind<P extends object>(
  definition: AggregateDefinition<P>,
): AggregateKind<P> {
  const payloads = new WeakMap<BoundAggregate, P>();

  function bind(payload: P): BoundAggregate {
    const handle: BoundAggregate = {
      tag: definition.tag,
      name: definition.name,

      tryMerge(other: BoundAggregate): BoundAggregate | null {
        const mine = payloads.get(handle);
        const theirs = payloads.get(other);
        if (mine === undefined || theirs === undefined) return null;
        return bind(definition.merge(mine, theirs));
      },

      export(): EventProperties | null {
        const current = payloads.get(handle);
        if (current === undefined) return null;
        payloads.delete(handle);
        return definition.export(current);
      },
    };

    payloads.set(handle, payload);
    return handle;
  }

  return {
    tag: definition.tag,
    name: definition.name,
    merge: definition.merge,
    export: definition.export,
    bind,
  };
}
