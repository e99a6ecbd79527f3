export type UserRole = 'reader' | 'admin' | 'superadmin';

export const USER_ROLES: readonly UserRole[] = ['reader', 'admin', 'superadmin'];

// Permissions an admin can be granted; superadmins hold all of them implicitly
export type Permission =
  | 'add_book'
  | 'update_book'
  | 'delete_book'
  | 'add_user'
  | 'update_user'
  | 'delete_user'
  | 'view_reports';

export const ALL_PERMISSIONS: readonly Permission[] = [
  'add_book',
  'update_book',
  'delete_book',
  'add_user',
  'update_user',
  'delete_user',
  'view_reports',
];

export interface User {
  userId: number;
  username: string; // Unique
  passwordHash: string;
  role: UserRole;
  createdAt: Date;
  phone: string | null;
  permissions: Permission[];
}

export type PublicUser = Omit<User, 'passwordHash'>;

/**
 * The authenticated caller of an administrative operation
 */
export type Actor = Pick<User, 'userId' | 'role' | 'permissions'>;

export interface RegisterUserInput {
  username: string;
  password: string;
  role?: UserRole;
  phone?: string | null;
}

export interface UpdateUserInput {
  username?: string;
  phone?: string | null;
  role?: UserRole;
}

export interface NewUserRow {
  username: string;
  passwordHash: string;
  role: UserRole;
  phone: string | null;
  permissions: Permission[];
}

export type UserPatch = Partial<Pick<User, 'username' | 'role' | 'phone' | 'permissions'>>;
