import { Queryable } from '../config/database';
import { UserRepository } from '../types/repository.types';
import { NewUserRow, User, UserPatch } from '../types/user.types';
import { serializePermissions } from '../utils/permission.utils';
import { mapUserRow } from './row.mappers';

const USER_COLUMNS = `user_id, username, password_hash, role, created_at, phone, permissions`;

export class PgUserRepository implements UserRepository {
  constructor(private readonly client: Queryable) {}

  async findById(userId: number): Promise<User | null> {
    const result = await this.client.query(
      `SELECT ${USER_COLUMNS} FROM users WHERE user_id = $1`,
      [userId]
    );
    return result.rows.length > 0 ? mapUserRow(result.rows[0]) : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const result = await this.client.query(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
      [username]
    );
    return result.rows.length > 0 ? mapUserRow(result.rows[0]) : null;
  }

  async insert(row: NewUserRow): Promise<User> {
    const query = `
      INSERT INTO users (username, password_hash, role, phone, permissions, created_at)
      VALUES ($1, $2, $3, $4, $5, NOW())
      RETURNING ${USER_COLUMNS}
    `;

    const result = await this.client.query(query, [
      row.username,
      row.passwordHash,
      row.role,
      row.phone,
      serializePermissions(row.permissions),
    ]);
    return mapUserRow(result.rows[0]);
  }

  async update(userId: number, patch: UserPatch): Promise<User | null> {
    const assignments: string[] = [];
    const params: unknown[] = [];

    const set = (column: string, value: unknown) => {
      params.push(value);
      assignments.push(`${column} = $${params.length}`);
    };

    if (patch.username !== undefined) set('username', patch.username);
    if (patch.role !== undefined) set('role', patch.role);
    if (patch.phone !== undefined) set('phone', patch.phone);
    if (patch.permissions !== undefined) set('permissions', serializePermissions(patch.permissions));

    if (assignments.length === 0) {
      return this.findById(userId);
    }

    params.push(userId);
    const result = await this.client.query(
      `UPDATE users SET ${assignments.join(', ')} WHERE user_id = $${params.length} RETURNING ${USER_COLUMNS}`,
      params
    );
    return result.rows.length > 0 ? mapUserRow(result.rows[0]) : null;
  }

  async delete(userId: number): Promise<boolean> {
    const result = await this.client.query(`DELETE FROM users WHERE user_id = $1`, [userId]);
    return (result.rowCount ?? 0) > 0;
  }

  async list(): Promise<User[]> {
    const result = await this.client.query(`SELECT ${USER_COLUMNS} FROM users ORDER BY username`);
    return result.rows.map(mapUserRow);
  }

  async count(): Promise<number> {
    const result = await this.client.query(`SELECT COUNT(*) AS count FROM users`);
    return Number(result.rows[0].count);
  }
}
