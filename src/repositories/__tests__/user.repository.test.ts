import { describe, expect, it } from 'vitest';
import { PgUserRepository } from '../user.repository';
import { RecordingClient } from './recording-client';

const userRow = {
  user_id: 9,
  username: 'clerk',
  password_hash: '$2a$04$placeholderhash',
  role: 'admin',
  created_at: new Date('2024-01-01T00:00:00Z'),
  phone: null,
  permissions: 'add_book, view_reports,bogus',
};

describe('PgUserRepository', () => {
  it('parses the permissions column', async () => {
    const client = new RecordingClient().respondWith([userRow]);
    const user = await new PgUserRepository(client).findByUsername('clerk');

    expect(user).toMatchObject({ userId: 9, role: 'admin', phone: null, permissions: ['add_book', 'view_reports'] });
    expect(client.lastCall.params).toEqual(['clerk']);
  });

  it('serializes permissions on update', async () => {
    const client = new RecordingClient().respondWith([userRow]);
    await new PgUserRepository(client).update(9, { username: 'neo', permissions: ['add_book'] });

    expect(client.lastCall.text).toContain('UPDATE users SET username = $1, permissions = $2 WHERE user_id = $3');
    expect(client.lastCall.params).toEqual(['neo', 'add_book', 9]);
  });

  it('rejects a role the application does not know', async () => {
    const client = new RecordingClient().respondWith([{ ...userRow, role: 'janitor' }]);

    await expect(new PgUserRepository(client).findById(9)).rejects.toThrow('Unknown user role in database: janitor');
  });

  it('reports whether a delete removed a row', async () => {
    const client = new RecordingClient();

    await expect(new PgUserRepository(client).delete(9)).resolves.toBe(false);
    expect(client.lastCall).toEqual({ text: 'DELETE FROM users WHERE user_id = $1', params: [9] });
  });
});
