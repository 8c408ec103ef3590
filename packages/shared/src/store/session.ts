/**
 * Store Sessions
 *
 * A session runner opens a short read-only scope over the reference data and
 * closes it when `fn` settles. Callers keep model calls outside of it.
 */

import type { ExampleFilter, ExampleIndex, ScoredExample } from '../retrieval/types';
import type { Building, Category, Service } from '../types';
import type { AssignedService, AssignmentQuery, ReferenceStore } from './types';

export type SessionStore = ReferenceStore & ExampleIndex;

export type StoreSession = <T>(fn: (store: SessionStore) => Promise<T>) => Promise<T>;

/** Runs every session against the same store, for in-memory data */
export function sharedStoreSession(store: SessionStore): StoreSession {
  return (fn) => fn(store);
}

/**
 * Store facade that opens one session per read, so that nothing stays
 * checked out between reads.
 */
export class SessionBoundStore implements SessionStore {
  constructor(private readonly session: StoreSession) {}

  nearest(embedding: number[], k: number, filter?: ExampleFilter): Promise<ScoredExample[]> {
    return this.session((store) => store.nearest(embedding, k, filter));
  }

  listCategories(): Promise<Category[]> {
    return this.session((store) => store.listCategories());
  }

  getCategory(id: string): Promise<Category | null> {
    return this.session((store) => store.getCategory(id));
  }

  findServiceByName(name: string): Promise<Service | null> {
    return this.session((store) => store.findServiceByName(name));
  }

  findBuildingsByStreetTokens(city: string, tokens: readonly string[]): Promise<Building[]> {
    return this.session((store) => store.findBuildingsByStreetTokens(city, tokens));
  }

  findServiceAssignments(query: AssignmentQuery): Promise<AssignedService[]> {
    return this.session((store) => store.findServiceAssignments(query));
  }
}
