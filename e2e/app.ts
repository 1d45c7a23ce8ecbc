import { Hono } from 'hono';
import { z } from 'zod';
import { validator } from '../src/utils/validator.js';
import { safeWrapAsync } from '../src/utils/wrap.js';

export interface StoredUser {
  id: number;
  name: string;
}

const newUserSchema = z.object({ name: z.string().min(1) });

/**
 * In-memory users API served under `/api`, standing in for a real backend.
 * Requests reach it through `app.request`, so nothing listens on a port.
 */
export function createApp() {
  const users = new Map<number, StoredUser>([[1, { id: 1, name: 'John Doe' }]]);
  let nextId = 2;

  const app = new Hono().basePath('/api');

  async function readUser(body: () => Promise<unknown>) {
    const [errJson, json] = await safeWrapAsync(body);
    if (errJson) {
      return null;
    }

    const [errValidate, parsed] = await validator(json, newUserSchema);
    return errValidate ? null : parsed;
  }

  app.get('/users/:id', (c) => {
    const user = users.get(Number(c.req.param('id')));
    return user ? c.json(user) : c.json({ message: 'not found' }, 404);
  });

  app.post('/users', async (c) => {
    const input = await readUser(() => c.req.json());
    if (!input) {
      return c.json({ message: 'invalid user' }, 400);
    }

    const user = { id: nextId++, name: input.name };
    users.set(user.id, user);
    return c.json(user, 201);
  });

  app.put('/users/:id', async (c) => {
    const id = Number(c.req.param('id'));
    const input = await readUser(() => c.req.json());
    if (!input) {
      return c.json({ message: 'invalid user' }, 400);
    }

    if (!users.has(id)) {
      return c.json({ message: 'not found' }, 404);
    }

    const user = { id, name: input.name };
    users.set(id, user);
    return c.json(user);
  });

  app.delete('/users/:id', (c) => {
    const id = Number(c.req.param('id'));
    const user = users.get(id);
    if (!user) {
      return c.json({ message: 'not found' }, 404);
    }

    users.delete(id);
    return c.json(user);
  });

  app.delete('/users/:id/avatar', (c) => c.body(null, 204));

  app.get('/headers', (c) => c.json(c.req.header()));

  app.get('/health', (c) => c.text('ok'));

  app.get('/old-users', (c) => c.redirect('/api/users/1'));

  app.get('/fail', (c) => c.json({ message: 'boom' }, 500));

  return app;
}
