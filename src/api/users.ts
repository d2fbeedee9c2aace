// POST /api/users and GET /api/users/:user_id

import { Hono } from 'hono';
import type { ProfileDatabase } from '../db/index.js';
import { getUser, toUserRecord, upsertUser } from '../services/profiles/users.js';
import { UserUpsertRequestSchema, validateBody } from './validation.js';

export function createUserRoutes(db: ProfileDatabase) {
  const app = new Hono();

  app.post('/', async (c) => {
    const body = await validateBody(c, UserUpsertRequestSchema);
    const { action, user } = upsertUser(db, body);

    return c.json({
      message: `User profile ${action} successfully`,
      user_id: user.userId,
      action,
    }, action === 'created' ? 201 : 200);
  });

  app.get('/:user_id{[0-9]+}', (c) => {
    const user = getUser(db, Number(c.req.param('user_id')));
    if (!user) return c.json({ error: 'User not found' }, 404);
    return c.json(toUserRecord(user));
  });

  return app;
}
