export const UserRole = {
  CUSTOMER: 'CUSTOMER',
  AGENT: 'AGENT',
  ADMIN: 'ADMIN',
} as const;

export type UserRole = (typeof UserRole)[keyof typeof UserRole];

export type DirectoryUser = {
  id: string;
  email: string;
  displayName: string;
  role: UserRole;
  createdAt: Date;
  deletedAt: Date | null;
};
