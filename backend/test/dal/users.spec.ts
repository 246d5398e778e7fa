import { describe, it, expect } from 'vitest';
import { KyselyUserStore } from '../../src/modules/users';
import { selectUserByIdSql } from '../../src/modules/users/dal/user.query-sql';
import { StorageError } from '../../src/shared/db/storage-error';
import { createFakeDb } from '../helpers/fake-pg-pool';

const ADMIN_ROW = {
  id: 'admin',
  name: null,
  email: null,
  status: 'active',
  data: null,
  scopes: ['superuser'],
  hashed_password: '$2b$04$abcdefghijklmnopqrstuuABCDEFGHIJKLMNOPQRSTUVWXYZ01234',
  created_at: new Date('2030-01-01T00:00:00Z'),
  updated_at: new Date('2030-01-01T00:00:00Z'),
};

describe('users DAL', () => {
  it('selectUserByIdSql looks the user up by primary key', async () => {
    const { db, queries } = createFakeDb(() => ({ rows: [ADMIN_ROW] }));

    const row = await selectUserByIdSql(db, 'admin');

    expect(row?.id).toBe('admin');
    expect(queries).toEqual([
      { sql: 'select * from "users" where "id" = $1', parameters: ['admin'] },
    ]);
  });

  it('KyselyUserStore.get maps rows to domain users', async () => {
    const { db } = createFakeDb(() => ({ rows: [ADMIN_ROW] }));

    const user = await new KyselyUserStore(db).get('admin');

    expect(user).toEqual({
      id: 'admin',
      name: null,
      email: null,
      status: 'active',
      data: null,
      scopes: ['superuser'],
      hashedPassword: ADMIN_ROW.hashed_password,
    });
  });

  it('KyselyUserStore.get returns null when no row matches', async () => {
    const { db } = createFakeDb(() => ({ rows: [] }));

    await expect(new KyselyUserStore(db).get('ghost')).resolves.toBeNull();
  });

  it('wraps driver failures in StorageError', async () => {
    const { db } = createFakeDb(() => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
    });

    const err = await new KyselyUserStore(db).get('admin').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StorageError);
    expect(err instanceof StorageError && err.operation).toBe('users.get');
  });

  it('insert serializes JSON columns', async () => {
    const { db, queries } = createFakeDb(() => ({ rows: [ADMIN_ROW] }));

    await new KyselyUserStore(db).insert({
      id: 'admin',
      name: null,
      email: null,
      status: 'active',
      data: null,
      scopes: ['superuser'],
      hashedPassword: ADMIN_ROW.hashed_password,
    });

    expect(queries).toHaveLength(1);
    expect(queries[0]?.sql).toBe(
      'insert into "users" ("id", "name", "email", "status", "data", "scopes", "hashed_password") ' +
        'values ($1, $2, $3, $4, $5, $6, $7) returning *',
    );
    expect(queries[0]?.parameters).toEqual([
      'admin',
      null,
      null,
      'active',
      null,
      '["superuser"]',
      ADMIN_ROW.hashed_password,
    ]);
  });

  it('update only sets the fields present in the patch', async () => {
    const { db, queries } = createFakeDb(() => ({ rows: [{ ...ADMIN_ROW, name: 'Admin' }] }));

    const user = await new KyselyUserStore(db).update('admin', { name: 'Admin', data: { theme: 'dark' } });

    expect(user?.name).toBe('Admin');
    expect(queries[0]?.sql).toBe(
      'update "users" set "name" = $1, "data" = $2, "updated_at" = $3 where "id" = $4 returning *',
    );
    expect(queries[0]?.parameters.slice(0, 2)).toEqual(['Admin', '{"theme":"dark"}']);
    expect(queries[0]?.parameters[2]).toBeInstanceOf(Date);
    expect(queries[0]?.parameters[3]).toBe('admin');
  });

  it('update returns null when the user does not exist', async () => {
    const { db } = createFakeDb(() => ({ rows: [], rowCount: 0 }));

    await expect(new KyselyUserStore(db).update('ghost', { name: 'x' })).resolves.toBeNull();
  });
});
