import { describe, it, expect } from 'vitest';
import { KyselyResourceStore } from '../../src/modules/resources';
import { StorageError } from '../../src/shared/db/storage-error';
import { createFakeDb } from '../helpers/fake-pg-pool';

const ID = '6f1c2e9a-3b4d-4c5e-8f70-1a2b3c4d5e6f';
const ROW = {
  id: ID,
  name: 'alpha',
  data: { k: 1 },
  created_at: new Date('2030-01-01T00:00:00Z'),
  updated_at: new Date('2030-01-01T00:00:00Z'),
};

describe('resources DAL', () => {
  it('list filters by escaped name substring, orders, then pages', async () => {
    const { db, queries } = createFakeDb(() => ({ rows: [ROW] }));

    const resources = await new KyselyResourceStore(db).list({
      q: 'a_b',
      skip: 5,
      size: 10,
      order: [{ field: 'name', direction: 'desc' }],
    });

    expect(resources).toEqual([{ id: ID, name: 'alpha', data: { k: 1 } }]);
    expect(queries[0]?.sql).toBe(
      'select * from "resources" where "name" ilike $1 order by "name" desc, "id" asc limit $2 offset $3',
    );
    expect(queries[0]?.parameters).toEqual(['%a\\_b%', 10, 5]);
  });

  it('list without filter or order still orders by id', async () => {
    const { db, queries } = createFakeDb(() => ({ rows: [] }));

    await new KyselyResourceStore(db).list({ q: null, skip: 0, size: 100, order: [] });

    expect(queries[0]?.sql).toBe('select * from "resources" order by "id" asc limit $1 offset $2');
  });

  it('get returns null when missing', async () => {
    const { db } = createFakeDb(() => ({ rows: [] }));

    await expect(new KyselyResourceStore(db).get(ID)).resolves.toBeNull();
  });

  it('replace upserts on the primary key', async () => {
    const { db, queries } = createFakeDb(() => ({ rows: [ROW] }));

    const replaced = await new KyselyResourceStore(db).replace(ID, { name: 'alpha', data: { k: 1 } });

    expect(replaced).toEqual({ id: ID, name: 'alpha', data: { k: 1 } });
    expect(queries[0]?.sql).toContain('insert into "resources" ("id", "name", "data") values ($1, $2, $3)');
    expect(queries[0]?.sql).toContain('on conflict ("id") do update set');
  });

  it('delete reports whether a row was removed', async () => {
    const removed = createFakeDb(() => ({ rowCount: 1 }));
    const missing = createFakeDb(() => ({ rowCount: 0 }));

    await expect(new KyselyResourceStore(removed.db).delete(ID)).resolves.toBe(true);
    await expect(new KyselyResourceStore(missing.db).delete(ID)).resolves.toBe(false);
    expect(removed.queries[0]?.sql).toBe('delete from "resources" where "id" = $1');
  });

  it('wraps driver failures in StorageError named after the operation', async () => {
    const { db } = createFakeDb(() => {
      throw new Error('timeout');
    });

    const err = await new KyselyResourceStore(db)
      .list({ q: null, skip: 0, size: 1, order: [] })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StorageError);
    expect(err instanceof StorageError && err.operation).toBe('resources.list');
  });
});
