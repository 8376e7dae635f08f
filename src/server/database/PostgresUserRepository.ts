import type { Pool } from 'pg';
import type { User } from '../../shared/types/user';
import { UserNotFoundError, type UserRepository } from './UserRepository';

interface UserRow {
  id: string;
  username: string;
  email: string;
  display_name: string;
  elo_rating: number;
  created_at: Date;
  updated_at: Date;
}

const USER_COLUMNS = 'id, username, email, display_name, elo_rating, created_at, updated_at';

const mapUserRow = (row: UserRow): User => ({
  id: row.id,
  username: row.username,
  email: row.email,
  displayName: row.display_name,
  rating: row.elo_rating,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

/**
 * PostgreSQL implementation over the `users` table
 * (migrations/001_create_users_table.sql). All queries are parameterized.
 */
export class PostgresUserRepository implements UserRepository {
  constructor(private readonly pool: Pool) {}

  async getById(id: string): Promise<User | null> {
    return this.findOne(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, id);
  }

  async getByUsername(username: string): Promise<User | null> {
    return this.findOne(`SELECT ${USER_COLUMNS} FROM users WHERE username = $1`, username);
  }

  async getByEmail(email: string): Promise<User | null> {
    return this.findOne(`SELECT ${USER_COLUMNS} FROM users WHERE LOWER(email) = LOWER($1)`, email);
  }

  async applyRatingDelta(id: string, delta: number): Promise<User> {
    // Incremented in SQL so concurrent writers never overwrite each other.
    const result = await this.pool.query<UserRow>(
      `UPDATE users
         SET elo_rating = elo_rating + $2, updated_at = NOW()
       WHERE id = $1
       RETURNING ${USER_COLUMNS}`,
      [id, delta]
    );
    const row = result.rows[0];
    if (!row) {
      throw new UserNotFoundError(id);
    }
    return mapUserRow(row);
  }

  private async findOne(query: string, param: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(query, [param]);
    const row = result.rows[0];
    return row ? mapUserRow(row) : null;
  }
}
