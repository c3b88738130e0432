import type { DirectoryUser, UserRole } from './user.types';

export const USER_DIRECTORY = Symbol('USER_DIRECTORY');

export interface UserDirectory {
  /** Throws NotFoundException for unknown or soft-deleted users. */
  resolve(userId: string): Promise<DirectoryUser>;

  list(filter?: { role?: UserRole }): Promise<DirectoryUser[]>;
}
