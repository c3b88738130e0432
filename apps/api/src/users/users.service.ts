import { Injectable, NotFoundException } from '@nestjs/common';
import { isUUID } from 'class-validator';
import { DatabaseService } from '../database/database.service';
import type { UserDirectory } from './user-directory';
import type { DirectoryUser, UserRole } from './user.types';

type UserRow = {
  id: string;
  email: string;
  display_name: string;
  role: UserRole;
  created_at: Date;
  deleted_at: Date | null;
};

const USER_COLUMNS = 'id, email, display_name, role, created_at, deleted_at';

@Injectable()
export class UsersService implements UserDirectory {
  constructor(private readonly db: DatabaseService) {}

  async resolve(userId: string): Promise<DirectoryUser> {
    // Ids are uuid columns; any other subject can never match a user.
    if (!isUUID(userId)) {
      throw new NotFoundException(`User ${userId} not found`);
    }

    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1 AND deleted_at IS NULL`,
      [userId],
    );
    const row = result.rows[0];
    if (!row) {
      throw new NotFoundException(`User ${userId} not found`);
    }
    return this.toUser(row);
  }

  async list(filter: { role?: UserRole } = {}): Promise<DirectoryUser[]> {
    const result = filter.role
      ? await this.db.query<UserRow>(
          `SELECT ${USER_COLUMNS} FROM users
            WHERE deleted_at IS NULL AND role = $1
            ORDER BY display_name ASC`,
          [filter.role],
        )
      : await this.db.query<UserRow>(
          `SELECT ${USER_COLUMNS} FROM users
            WHERE deleted_at IS NULL
            ORDER BY display_name ASC`,
        );
    return result.rows.map((row) => this.toUser(row));
  }

  private toUser(row: UserRow): DirectoryUser {
    return {
      id: row.id,
      email: row.email,
      displayName: row.display_name,
      role: row.role,
      createdAt: row.created_at,
      deletedAt: row.deleted_at,
    };
  }
}
