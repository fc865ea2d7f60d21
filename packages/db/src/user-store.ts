import type { Queryable } from './client'
import { toUser } from './rows'
import type { User } from './types'

export interface UserStore {
  getUserById(userId: string): Promise<User | null>
}

export class PgUserStore implements UserStore {
  constructor(private readonly db: Queryable) {}

  async getUserById(userId: string): Promise<User | null> {
    const { rows } = await this.db.query('SELECT id, email FROM users WHERE id = $1', [userId])
    return rows.length > 0 ? toUser(rows[0]) : null
  }
}
