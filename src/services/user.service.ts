import bcrypt from 'bcryptjs';
import { config } from '../config/config';
import { DataSource } from '../types/repository.types';
import {
  Actor,
  Permission,
  PublicUser,
  RegisterUserInput,
  UpdateUserInput,
  User,
  UserPatch,
  UserRole,
  USER_ROLES,
} from '../types/user.types';
import { logger } from '../utils/logger';
import { ConstraintViolationError, ForbiddenError, NotFoundError, ValidationError } from '../utils/errors';
import { requirePermission, requireSuperadmin, validatePermissions } from '../utils/permission.utils';

export interface UserServiceOptions {
  bcryptRounds?: number;
}

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}

export class UserService {
  private readonly bcryptRounds: number;

  constructor(
    private readonly dataSource: DataSource,
    options: UserServiceOptions = {}
  ) {
    this.bcryptRounds = options.bcryptRounds ?? config.auth.bcryptRounds;
  }

  /**
   * Create a new user with a bcrypt password hash
   * Permissions always start empty
   */
  async registerUser(input: RegisterUserInput): Promise<PublicUser> {
    const username = (input.username ?? '').trim();
    if (!username || !input.password) {
      throw new ValidationError('Username and password cannot be empty');
    }

    const role = input.role ?? 'reader';
    if (!USER_ROLES.includes(role)) {
      throw new ValidationError(`Invalid role: ${role}`);
    }

    const phone = input.phone?.trim() || null;
    if (phone && !/^\d+$/.test(phone)) {
      logger.warn(`Phone number for ${username} contains non-digit characters`);
    }

    if (await this.dataSource.users.findByUsername(username)) {
      throw new ConstraintViolationError(`Username '${username}' already exists`);
    }

    const passwordHash = await bcrypt.hash(input.password, this.bcryptRounds);
    const user = await this.dataSource.users.insert({
      username,
      passwordHash,
      role,
      phone,
      permissions: [],
    });

    logger.info(`User created: ${username}`, { userId: user.userId, role });
    return toPublicUser(user);
  }

  /**
   * Administrative user creation
   * Admins with add_user may create readers; only a superadmin creates admins
   */
  async createUser(actor: Actor, input: RegisterUserInput): Promise<PublicUser> {
    requirePermission(actor, 'add_user');

    const role = input.role ?? 'reader';
    if (role === 'superadmin') {
      throw new ForbiddenError('Superadmin accounts cannot be created this way');
    }
    if (role === 'admin' && actor.role !== 'superadmin') {
      throw new ForbiddenError('Only superadmin can create admin users');
    }

    return this.registerUser({ ...input, role });
  }

  /**
   * Check a username/password pair
   * Returns the user without its hash, or null when either part is wrong
   */
  async verifyCredentials(username: string, password: string): Promise<PublicUser | null> {
    const user = await this.dataSource.users.findByUsername(username);
    if (!user) {
      return null;
    }

    const matches = await bcrypt.compare(password, user.passwordHash);
    return matches ? toPublicUser(user) : null;
  }

  async getUser(userId: number): Promise<PublicUser> {
    return toPublicUser(await this.requireUser(userId));
  }

  async listUsers(actor: Actor): Promise<PublicUser[]> {
    requirePermission(actor, 'view_reports');
    const users = await this.dataSource.users.list();
    return users.map(toPublicUser);
  }

  async updateUser(actor: Actor, userId: number, input: UpdateUserInput): Promise<PublicUser> {
    requirePermission(actor, 'update_user');
    const target = await this.requireUser(userId);

    if (actor.role !== 'superadmin') {
      if (target.role !== 'reader') {
        throw new ForbiddenError('Only superadmin can modify admin or superadmin users');
      }
      if (target.userId === actor.userId) {
        throw new ForbiddenError('Admins cannot modify their own account');
      }
      if (input.role !== undefined && input.role !== target.role) {
        throw new ForbiddenError('Only superadmin can change roles');
      }
    }

    const patch: UserPatch = {};

    if (input.username !== undefined) {
      const username = input.username.trim();
      if (!username) {
        throw new ValidationError('Username cannot be empty');
      }
      patch.username = username;
    }
    if (input.phone !== undefined) {
      patch.phone = input.phone?.trim() || null;
    }
    if (input.role !== undefined && input.role !== target.role) {
      Object.assign(patch, this.roleChange(target, input.role));
    }

    const updated = await this.dataSource.users.update(userId, patch);
    if (!updated) {
      throw new NotFoundError(`User with ID ${userId} not found`);
    }

    logger.info(`User updated: ${updated.username}`, { userId });
    return toPublicUser(updated);
  }

  /**
   * Refuses while the user still holds open loans, so the loans cascade
   * only ever removes closed history
   */
  async deleteUser(actor: Actor, userId: number): Promise<void> {
    requirePermission(actor, 'delete_user');

    if (userId === actor.userId) {
      throw new ForbiddenError('Cannot delete your own account');
    }

    await this.dataSource.transaction(async (tx) => {
      const target = await tx.users.findById(userId);
      if (!target) {
        throw new NotFoundError(`User with ID ${userId} not found`);
      }
      if (target.role !== 'reader' && actor.role !== 'superadmin') {
        throw new ForbiddenError('Only superadmin can delete admin or superadmin users');
      }
      if ((await tx.loans.countOpen({ userId })) > 0) {
        throw new ConstraintViolationError('Cannot delete user with active loans');
      }
      await tx.users.delete(userId);
    });

    logger.info(`User deleted`, { userId });
  }

  /**
   * Switch a user between reader and admin. Permissions are replaced by
   * `permissions` in the same update, or cleared when none are given.
   */
  async assignRole(
    actor: Actor,
    userId: number,
    role: UserRole,
    permissions?: readonly string[]
  ): Promise<PublicUser> {
    requireSuperadmin(actor, 'manage roles');
    const target = await this.requireUser(userId);

    const patch = this.roleChange(target, role, true);
    if (permissions !== undefined && permissions.length > 0) {
      if (role !== 'admin') {
        throw new ValidationError('Permissions can only be managed for admin users');
      }
      patch.permissions = validatePermissions(permissions);
    }

    const updated = await this.dataSource.users.update(userId, patch);
    if (!updated) {
      throw new NotFoundError(`User with ID ${userId} not found`);
    }

    logger.info(`Role changed for ${updated.username}`, { userId, role, permissions: updated.permissions });
    return toPublicUser(updated);
  }

  async assignPermissions(actor: Actor, userId: number, permissions: readonly string[]): Promise<PublicUser> {
    requireSuperadmin(actor, 'manage permissions');
    const target = await this.requireUser(userId);

    if (target.role !== 'admin') {
      throw new ValidationError('Permissions can only be managed for admin users');
    }

    const granted: Permission[] = validatePermissions(permissions);
    const updated = await this.dataSource.users.update(userId, { permissions: granted });
    if (!updated) {
      throw new NotFoundError(`User with ID ${userId} not found`);
    }

    logger.info(`Permissions updated for ${updated.username}`, { userId, permissions: granted });
    return toPublicUser(updated);
  }

  /**
   * Create the initial superadmin if the username is free
   * @returns true when the account was created
   */
  async ensureSuperadmin(username: string, password: string): Promise<boolean> {
    if (await this.dataSource.users.findByUsername(username)) {
      return false;
    }

    await this.registerUser({ username, password, role: 'superadmin' });
    logger.info('Initial superadmin created');
    return true;
  }

  private async requireUser(userId: number): Promise<User> {
    const user = await this.dataSource.users.findById(userId);
    if (!user) {
      throw new NotFoundError(`User with ID ${userId} not found`);
    }
    return user;
  }

  private roleChange(target: User, role: UserRole, alwaysClear: boolean = false): UserPatch {
    if (target.role === 'superadmin') {
      throw new ForbiddenError('Cannot modify superadmin role');
    }
    if (role !== 'reader' && role !== 'admin') {
      throw new ValidationError("Invalid role. Must be 'reader' or 'admin'");
    }

    const patch: UserPatch = { role };
    if (alwaysClear || role === 'reader') {
      patch.permissions = [];
    }
    return patch;
  }
}
