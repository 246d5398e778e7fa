import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { API, buildTestApp } from '../helpers/build-test-app';
import { makeUser } from '../helpers/inmem-user-store';

/**
 * E2E tests for the /resources CRUD endpoints behind scope guards.
 */

const ResourceSchema = z.object({
  id: z.string().uuid(),
  name: z.string(),
  data: z.record(z.string(), z.unknown()).nullable(),
});

const ErrorResponseSchema = z.object({
  detail: z.array(
    z.object({ type: z.string().nullable(), msg: z.string(), input: z.unknown(), loc: z.unknown(), ctx: z.unknown() }),
  ),
});

function firstError(res: { json: () => unknown }) {
  const detail = ErrorResponseSchema.parse(res.json()).detail[0];
  if (!detail) throw new Error('expected an error detail');
  return detail;
}

const FIXED_ID = '6f1c2e9a-3b4d-4c5e-8f70-1a2b3c4d5e6f';

describe('/resources', () => {
  it('supports create, read, list, patch, replace and delete', async () => {
    const { app, tokenFor, close } = await buildTestApp();
    const headers = { authorization: `Bearer ${tokenFor('admin', ['resources:read', 'resources:write'])}` };

    try {
      // create
      const created = await app.inject({
        method: 'POST',
        url: `${API}/resources`,
        headers,
        payload: { name: 'alpha', data: { k: 1 } },
      });
      expect(created.statusCode).toBe(201);
      const alpha = ResourceSchema.parse(created.json());
      expect(alpha).toMatchObject({ name: 'alpha', data: { k: 1 } });

      // read
      const got = await app.inject({ method: 'GET', url: `${API}/resources/${alpha.id}`, headers });
      expect(got.statusCode).toBe(200);
      expect(got.json()).toEqual(alpha);

      // list with filter
      await app.inject({ method: 'POST', url: `${API}/resources`, headers, payload: { name: 'beta' } });
      const listed = await app.inject({ method: 'GET', url: `${API}/resources?q=ALP`, headers });
      expect(listed.statusCode).toBe(200);
      expect(listed.json()).toEqual([alpha]);

      // patch keeps untouched fields
      const patched = await app.inject({
        method: 'PATCH',
        url: `${API}/resources/${alpha.id}`,
        headers,
        payload: { name: 'alpha-2' },
      });
      expect(patched.statusCode).toBe(200);
      expect(patched.json()).toEqual({ id: alpha.id, name: 'alpha-2', data: { k: 1 } });

      // replace creates when missing
      const replaced = await app.inject({
        method: 'PUT',
        url: `${API}/resources/${FIXED_ID}`,
        headers,
        payload: { name: 'gamma' },
      });
      expect(replaced.statusCode).toBe(200);
      expect(replaced.json()).toEqual({ id: FIXED_ID, name: 'gamma', data: null });

      // delete, then 404
      const deleted = await app.inject({ method: 'DELETE', url: `${API}/resources/${alpha.id}`, headers });
      expect(deleted.statusCode).toBe(204);

      const gone = await app.inject({ method: 'GET', url: `${API}/resources/${alpha.id}`, headers });
      expect(gone.statusCode).toBe(404);
      expect(firstError(gone)).toMatchObject({ type: 'not_found', msg: 'resource not found', input: alpha.id });
    } finally {
      await close();
    }
  });

  it('orders and pages the list', async () => {
    const { app, tokenFor, close } = await buildTestApp();
    const headers = { authorization: `Bearer ${tokenFor('admin', [])}` };

    try {
      for (const name of ['b', 'c', 'a']) {
        await app.inject({ method: 'POST', url: `${API}/resources`, headers, payload: { name } });
      }

      const res = await app.inject({
        method: 'GET',
        url: `${API}/resources?order=-name&skip=1&size=1`,
        headers,
      });

      expect(res.statusCode).toBe(200);
      expect(z.array(ResourceSchema).parse(res.json()).map((r) => r.name)).toEqual(['b']);
    } finally {
      await close();
    }
  });

  it('rejects invalid ids, queries and bodies with 422', async () => {
    const { app, tokenFor, close } = await buildTestApp();
    const headers = { authorization: `Bearer ${tokenFor('admin', [])}` };

    try {
      const badId = await app.inject({ method: 'GET', url: `${API}/resources/not-a-uuid`, headers });
      expect(badId.statusCode).toBe(422);
      expect(firstError(badId).msg).toBe('invalid resource id');

      const badQuery = await app.inject({ method: 'GET', url: `${API}/resources?size=0`, headers });
      expect(badQuery.statusCode).toBe(422);
      expect(firstError(badQuery).msg).toBe('invalid query');

      const badOrder = await app.inject({ method: 'GET', url: `${API}/resources?order=created_at`, headers });
      expect(badOrder.statusCode).toBe(422);

      const badBody = await app.inject({
        method: 'POST',
        url: `${API}/resources`,
        headers,
        payload: { name: '' },
      });
      expect(badBody.statusCode).toBe(422);
      expect(firstError(badBody).msg).toBe('invalid resource');
    } finally {
      await close();
    }
  });

  it('returns 404 when patching or deleting a missing resource', async () => {
    const { app, tokenFor, close } = await buildTestApp();
    const headers = { authorization: `Bearer ${tokenFor('admin', [])}` };

    try {
      const patch = await app.inject({
        method: 'PATCH',
        url: `${API}/resources/${FIXED_ID}`,
        headers,
        payload: { name: 'x' },
      });
      expect(patch.statusCode).toBe(404);

      const del = await app.inject({ method: 'DELETE', url: `${API}/resources/${FIXED_ID}`, headers });
      expect(del.statusCode).toBe(404);
    } finally {
      await close();
    }
  });

  it('denies writes to a reader and names the missing scope', async () => {
    const { app, userStore, tokenFor, close } = await buildTestApp();

    try {
      userStore.put(makeUser({ id: 'reader', scopes: ['resources:read'] }));
      const headers = { authorization: `Bearer ${tokenFor('reader', ['resources:read'])}` };

      const read = await app.inject({ method: 'GET', url: `${API}/resources`, headers });
      expect(read.statusCode).toBe(200);

      const write = await app.inject({
        method: 'POST',
        url: `${API}/resources`,
        headers,
        payload: { name: 'nope' },
      });
      expect(write.statusCode).toBe(401);
      expect(write.headers['www-authenticate']).toBe('Bearer scope="resources:write"');
      expect(firstError(write)).toMatchObject({
        msg: 'insufficient permissions',
        ctx: { missingScopes: ['resources:write'] },
      });
    } finally {
      await close();
    }
  });

  it('maps a failing store to 500 database with the operation message', async () => {
    const { app, resourceStore, tokenFor, close } = await buildTestApp();
    const headers = { authorization: `Bearer ${tokenFor('admin', [])}` };

    try {
      resourceStore.failAll(true);

      const res = await app.inject({ method: 'GET', url: `${API}/resources`, headers });

      expect(res.statusCode).toBe(500);
      expect(firstError(res)).toMatchObject({ type: 'database', msg: 'unable to get resources' });
    } finally {
      await close();
    }
  });
});
