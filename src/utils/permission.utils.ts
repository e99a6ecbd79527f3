import { Actor, ALL_PERMISSIONS, Permission } from '../types/user.types';
import { ForbiddenError, ValidationError } from './errors';

function isPermission(value: string): value is Permission {
  return ALL_PERMISSIONS.some((permission) => permission === value);
}

/**
 * Parse the comma-separated permissions column
 * Unknown names are dropped
 */
export function parsePermissions(blob: string | null | undefined): Permission[] {
  if (!blob) {
    return [];
  }

  return blob
    .split(',')
    .map((part) => part.trim())
    .filter(isPermission);
}

export function serializePermissions(permissions: readonly Permission[]): string {
  return permissions.join(',');
}

/**
 * Validate user-supplied permission names
 * @throws ValidationError listing every unknown name
 */
export function validatePermissions(names: readonly string[]): Permission[] {
  const cleaned = names.map((name) => name.trim()).filter((name) => name.length > 0);
  const invalid = cleaned.filter((name) => !isPermission(name));

  if (invalid.length > 0) {
    throw new ValidationError(`Invalid permissions: ${invalid.join(', ')}`);
  }

  return [...new Set(cleaned.filter(isPermission))];
}

/**
 * Superadmins hold every permission; admins hold what they were granted
 */
export function hasPermission(actor: Actor, permission: Permission): boolean {
  if (actor.role === 'superadmin') {
    return true;
  }
  if (actor.role !== 'admin') {
    return false;
  }
  return actor.permissions.includes(permission);
}

export function requirePermission(actor: Actor, permission: Permission): void {
  if (!hasPermission(actor, permission)) {
    throw new ForbiddenError(`Permission denied: requires '${permission}' permission`);
  }
}

export function requireSuperadmin(actor: Actor, action: string): void {
  if (actor.role !== 'superadmin') {
    throw new ForbiddenError(`Permission denied: only superadmin can ${action}`);
  }
}
