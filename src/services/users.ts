/**
 * User lifecycle operations.
 */

import type { Knex } from 'knex';
import { TABLES, type UserRow } from './database.js';
import { logger } from '../utils/logger.js';
import type { User } from '../types/models.js';

export interface UserUpdate {
  name?: string;
  email?: string | null;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email ?? null,
  };
}

export class UserService {
  constructor(private readonly db: Knex) {}

  async listAll(): Promise<User[]> {
    const rows = await this.db<UserRow>(TABLES.users).select('*').orderBy('id');
    return rows.map(toUser);
  }

  async getById(id: number): Promise<User | undefined> {
    const row = await this.db<UserRow>(TABLES.users).where({ id }).first();
    return row ? toUser(row) : undefined;
  }

  async exists(id: number): Promise<boolean> {
    return (await this.getById(id)) !== undefined;
  }

  /**
   * Insert a user as given. Name and email are validated by the caller.
   */
  async create(name: string, email: string | null = null): Promise<User> {
    const [id] = await this.db(TABLES.users).insert({ name, email });
    logger.debug(`Created user ${id}`);
    return { id, name, email };
  }

  /**
   * Apply the provided fields. Returns undefined when the user does not exist.
   */
  async update(id: number, changes: UserUpdate): Promise<User | undefined> {
    const existing = await this.getById(id);
    if (!existing) {
      return undefined;
    }

    const patch: Partial<Omit<UserRow, 'id'>> = {};
    if (changes.name !== undefined) {
      patch.name = changes.name;
    }
    if (changes.email !== undefined) {
      patch.email = changes.email;
    }

    if (Object.keys(patch).length > 0) {
      await this.db(TABLES.users).where({ id }).update(patch);
    }

    return { ...existing, ...patch };
  }

  /**
   * Remove a user. Quotes and policies that reference it are left in place.
   */
  async delete(id: number): Promise<boolean> {
    const deleted = await this.db(TABLES.users).where({ id }).del();
    return deleted > 0;
  }
}
