/**
 * Active Pointer — the "currently believed active" index over an
 * {@link EndpointSet}.
 *
 * Callers take a snapshot with {@link ActivePointer.getActive}, make their
 * call, and on a placement failure pass the snapshot back to
 * {@link ActivePointer.advance}. Only a snapshot that is still current moves
 * the index, so any number of callers that saw the same endpoint fail
 * produce a single failover.
 *
 * Every method runs to completion without awaiting, which makes each
 * read-compare-advance atomic on the event loop. Nothing here is held
 * across a remote call.
 *
 * @module
 */

import { ClosedError } from './errors.js';
import type { EndpointSet } from './endpoint-set.js';
import type { ServiceEndpoint } from './types.js';

export interface ActiveSnapshot {
  endpoint: ServiceEndpoint;
  /** Index value read together with `endpoint` */
  observedIndex: number;
}

export class ActivePointer {
  private currentIndex: number;

  constructor(
    private readonly endpoints: EndpointSet,
    initialIndex = 0,
  ) {
    this.currentIndex = endpoints.length > 0 ? initialIndex % endpoints.length : 0;
  }

  get current(): number {
    return this.currentIndex;
  }

  /** Number of endpoints; 0 once closed. */
  get size(): number {
    return this.endpoints.length;
  }

  get closed(): boolean {
    return this.endpoints.isEmpty;
  }

  /**
   * @throws {ClosedError} once the set has been cleared
   */
  getActive(): ActiveSnapshot {
    const endpoint = this.endpoints.at(this.currentIndex);
    if (!endpoint) {
      throw new ClosedError();
    }
    return { endpoint, observedIndex: this.currentIndex };
  }

  /**
   * Move to the next endpoint if `observedIndex` is still current.
   *
   * @returns true if this call moved the index, false for a stale snapshot
   */
  advance(observedIndex: number): boolean {
    if (observedIndex !== this.currentIndex || this.endpoints.isEmpty) {
      return false;
    }
    this.currentIndex = (this.currentIndex + 1) % this.endpoints.length;
    return true;
  }

  /**
   * Clear the set. Idempotent; returns the endpoints removed by this call.
   */
  close(): ServiceEndpoint[] {
    return this.endpoints.clear();
  }
}
