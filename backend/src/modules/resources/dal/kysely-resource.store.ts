/**
 * backend/src/modules/resources/dal/kysely-resource.store.ts
 *
 * WHY:
 * - Postgres-backed ResourceStore (Kysely).
 * - Wraps driver failures in StorageError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { withStorage } from '../../../shared/db/storage-error';
import type { ResourceStore } from '../resource.store';
import type {
  Resource,
  ResourceInput,
  ResourceListQuery,
  ResourcePatch,
} from '../resource.types';
import { selectResourceByIdSql, selectResourcesSql, type ResourceRow } from './resource.query-sql';
import { ResourceRepo } from './resource.repo';

function toResource(row: ResourceRow): Resource {
  return { id: row.id, name: row.name, data: row.data ?? null };
}

export class KyselyResourceStore implements ResourceStore {
  private readonly repo: ResourceRepo;

  constructor(private readonly db: DbExecutor) {
    this.repo = new ResourceRepo(db);
  }

  async list(query: ResourceListQuery): Promise<Resource[]> {
    const rows = await withStorage('resources.list', () => selectResourcesSql(this.db, query));
    return rows.map(toResource);
  }

  async get(id: string): Promise<Resource | null> {
    const row = await withStorage('resources.get', () => selectResourceByIdSql(this.db, id));
    return row ? toResource(row) : null;
  }

  async insert(resource: Resource): Promise<Resource> {
    return toResource(await withStorage('resources.insert', () => this.repo.insertResource(resource)));
  }

  async update(id: string, patch: ResourcePatch): Promise<Resource | null> {
    const row = await withStorage('resources.update', () => this.repo.updateResource(id, patch));
    return row ? toResource(row) : null;
  }

  async replace(id: string, input: ResourceInput): Promise<Resource> {
    return toResource(await withStorage('resources.replace', () => this.repo.upsertResource(id, input)));
  }

  async delete(id: string): Promise<boolean> {
    return withStorage('resources.delete', () => this.repo.deleteResource(id));
  }
}
