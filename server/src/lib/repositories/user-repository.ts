/**
 * UserRepository
 * Looks up the accounts that incoming email can act on behalf of
 */

import { QueryExecutor } from '../db/transaction-utils';
import { User, UserLookup } from '../../types/incoming-email';

export type UserRow = {
  id: number;
  username: string;
  email: string;
  state: string;
  admin: boolean;
};

const USER_COLUMNS = 'u.id, u.username, u.email, u.state, u.admin';

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    blocked: row.state === 'blocked',
    admin: row.admin
  };
}

export class UserRepository implements UserLookup {
  constructor(private db: QueryExecutor) {}

  async findById(id: number): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users u WHERE u.id = $1`,
      [id]
    );
    return result.rows[0] ? toUser(result.rows[0]) : null;
  }

  /**
   * Match the primary address or any confirmed secondary address, ignoring case
   */
  async findByAnyEmail(email: string): Promise<User | null> {
    const normalized = email.trim().toLowerCase();
    if (!normalized) return null;

    const result = await this.db.query<UserRow>(`
      SELECT ${USER_COLUMNS}
      FROM users u
      WHERE lower(u.email) = $1
      UNION
      SELECT ${USER_COLUMNS}
      FROM users u
      JOIN emails e ON e.user_id = u.id
      WHERE lower(e.email) = $1 AND e.confirmed_at IS NOT NULL
      LIMIT 1
    `, [normalized]);

    return result.rows[0] ? toUser(result.rows[0]) : null;
  }
}
