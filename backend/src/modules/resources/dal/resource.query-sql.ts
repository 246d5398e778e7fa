/**
 * backend/src/modules/resources/dal/resource.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for resources.
 *
 * RULES:
 * - No AppError.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { ResourcesTable } from '../../../shared/db/database.schema';
import type { ResourceListQuery } from '../resource.types';

export type ResourceRow = Selectable<ResourcesTable>;

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

export async function selectResourcesSql(
  db: DbExecutor,
  query: ResourceListQuery,
): Promise<ResourceRow[]> {
  let qb = db.selectFrom('resources').selectAll();

  if (query.q) {
    qb = qb.where('name', 'ilike', `%${escapeLike(query.q)}%`);
  }

  for (const o of query.order) {
    qb = qb.orderBy(o.field, o.direction);
  }
  // Stable pagination even without an explicit order.
  if (!query.order.some((o) => o.field === 'id')) {
    qb = qb.orderBy('id', 'asc');
  }

  return qb.offset(query.skip).limit(query.size).execute();
}

export async function selectResourceByIdSql(
  db: DbExecutor,
  id: string,
): Promise<ResourceRow | undefined> {
  return db.selectFrom('resources').selectAll().where('id', '=', id).executeTakeFirst();
}
