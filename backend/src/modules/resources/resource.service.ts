/**
 * backend/src/modules/resources/resource.service.ts
 *
 * WHY:
 * - CRUD use-cases for resources. Thin: the interesting part of this API is
 *   the access guard in front of it.
 *
 * RULES:
 * - StorageError → 500 `database` carrying the attempted input.
 * - Missing row → 404 `not_found`.
 */

import { randomUUID } from 'node:crypto';
import { StorageError } from '../../shared/db/storage-error';
import { AppError } from '../../shared/http/errors';
import type { ResourceStore } from './resource.store';
import type {
  Resource,
  ResourceInput,
  ResourceListQuery,
  ResourcePatch,
} from './resource.types';

async function orDatabaseError<T>(msg: string, input: unknown, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof StorageError) {
      throw AppError.database(msg, { input, ctx: { error: err.message } });
    }
    throw err;
  }
}

export class ResourceService {
  constructor(private readonly deps: { resourceStore: ResourceStore }) {}

  async list(query: ResourceListQuery): Promise<Resource[]> {
    return orDatabaseError('unable to get resources', query, () => this.deps.resourceStore.list(query));
  }

  async get(id: string): Promise<Resource> {
    const found = await orDatabaseError('unable to get resource', id, () =>
      this.deps.resourceStore.get(id),
    );
    if (!found) throw AppError.notFound('resource not found', { input: id });
    return found;
  }

  async create(input: ResourceInput & { id?: string }): Promise<Resource> {
    const resource: Resource = { id: input.id ?? randomUUID(), name: input.name, data: input.data };
    return orDatabaseError('unable to create resource', resource, () =>
      this.deps.resourceStore.insert(resource),
    );
  }

  async update(id: string, patch: ResourcePatch): Promise<Resource> {
    const updated = await orDatabaseError('unable to update resource', { id, resource: patch }, () =>
      this.deps.resourceStore.update(id, patch),
    );
    if (!updated) {
      throw AppError.notFound('resource not found', { input: { id, resource: patch } });
    }
    return updated;
  }

  async replace(id: string, input: ResourceInput): Promise<Resource> {
    return orDatabaseError('unable to replace resource', { id, resource: input }, () =>
      this.deps.resourceStore.replace(id, input),
    );
  }

  async delete(id: string): Promise<void> {
    const deleted = await orDatabaseError('unable to delete resource', id, () =>
      this.deps.resourceStore.delete(id),
    );
    if (!deleted) throw AppError.notFound('resource not found', { input: id });
  }
}
