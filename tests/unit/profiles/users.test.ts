import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createDatabase, type DatabaseHandle } from '../../../src/db/index.js';
import { getUser, toUserRecord, upsertUser } from '../../../src/services/profiles/users.js';
import { PersistenceError, ValidationError } from '../../../src/utils/errors.js';

describe('users service', () => {
  let handle: DatabaseHandle;

  beforeEach(() => {
    handle = createDatabase(':memory:');
  });

  afterEach(() => {
    handle.close();
  });

  it('creates then updates the same row', () => {
    const created = upsertUser(handle.db, { user_id: 10, name: 'Ada', bio: 'first' });
    const updated = upsertUser(handle.db, { user_id: 10, bio: 'second' });

    expect(created.action).toBe('created');
    expect(updated.action).toBe('updated');
    expect(updated.user.createdAt).toBe(created.user.createdAt);
    expect(toUserRecord(updated.user)).toEqual({
      user_id: 10,
      display_name: null,
      name: 'Ada',
      bio: 'second',
      location: null,
      profile_pic_url: null,
      created_at: created.user.createdAt,
    });
  });

  it('requires a name on create', () => {
    expect(() => upsertUser(handle.db, { user_id: 11 })).toThrow(ValidationError);
    expect(getUser(handle.db, 11)).toBeNull();
  });

  it('wraps storage failures', () => {
    handle.close();

    expect(() => upsertUser(handle.db, { user_id: 12, name: 'Grace' })).toThrow(PersistenceError);
  });

  it('returns null for an unknown user', () => {
    expect(getUser(handle.db, 404)).toBeNull();
  });
});
