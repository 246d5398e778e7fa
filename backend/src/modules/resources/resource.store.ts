/**
 * backend/src/modules/resources/resource.store.ts
 *
 * WHY:
 * - Persistence contract for resources; the service depends on this, tests
 *   swap in an in-memory implementation.
 *
 * CONTRACT:
 * - Lookups return null / false for "not found".
 * - Every method throws StorageError on transport/driver failure.
 */

import type {
  Resource,
  ResourceId,
  ResourceInput,
  ResourceListQuery,
  ResourcePatch,
} from './resource.types';

export interface ResourceStore {
  list(query: ResourceListQuery): Promise<Resource[]>;
  get(id: ResourceId): Promise<Resource | null>;
  insert(resource: Resource): Promise<Resource>;
  update(id: ResourceId, patch: ResourcePatch): Promise<Resource | null>;
  /** Insert or overwrite the row with this id. */
  replace(id: ResourceId, input: ResourceInput): Promise<Resource>;
  delete(id: ResourceId): Promise<boolean>;
}
