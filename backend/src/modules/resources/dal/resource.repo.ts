/**
 * backend/src/modules/resources/dal/resource.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for resources (mutations).
 *
 * RULES:
 * - No transactions started here.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { Resource, ResourceInput, ResourcePatch } from '../resource.types';
import type { ResourceRow } from './resource.query-sql';

function toJson(value: unknown): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value);
}

export class ResourceRepo {
  constructor(private readonly db: DbExecutor) {}

  async insertResource(resource: Resource): Promise<ResourceRow> {
    return this.db
      .insertInto('resources')
      .values({ id: resource.id, name: resource.name, data: toJson(resource.data) })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  async updateResource(id: string, patch: ResourcePatch): Promise<ResourceRow | undefined> {
    return this.db
      .updateTable('resources')
      .set({
        ...(patch.name !== undefined ? { name: patch.name } : {}),
        ...(patch.data !== undefined ? { data: toJson(patch.data) } : {}),
        updated_at: new Date(),
      })
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirst();
  }

  async upsertResource(id: string, input: ResourceInput): Promise<ResourceRow> {
    const data = toJson(input.data);

    return this.db
      .insertInto('resources')
      .values({ id, name: input.name, data })
      .onConflict((oc) => oc.column('id').doUpdateSet({ name: input.name, data, updated_at: new Date() }))
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  async deleteResource(id: string): Promise<boolean> {
    const result = await this.db.deleteFrom('resources').where('id', '=', id).executeTakeFirst();
    return result.numDeletedRows > 0n;
  }
}
