import { describe, expect, it } from 'vitest';
import {
  hasPermission,
  parsePermissions,
  requirePermission,
  serializePermissions,
  validatePermissions,
} from '../permission.utils';
import { ForbiddenError, ValidationError } from '../errors';

describe('permission utils', () => {
  it('parses the comma-separated column and drops unknown names', () => {
    expect(parsePermissions(' add_book ,,nope,view_reports')).toEqual(['add_book', 'view_reports']);
    expect(parsePermissions(null)).toEqual([]);
    expect(parsePermissions('')).toEqual([]);
  });

  it('serializes permissions without spaces', () => {
    expect(serializePermissions(['add_book', 'delete_user'])).toBe('add_book,delete_user');
  });

  it('gives superadmins every permission and readers none', () => {
    expect(hasPermission({ userId: 1, role: 'superadmin', permissions: [] }, 'delete_book')).toBe(true);
    expect(hasPermission({ userId: 2, role: 'reader', permissions: ['delete_book'] }, 'delete_book')).toBe(false);
  });

  it('gives admins exactly what they were granted', () => {
    const admin = { userId: 3, role: 'admin' as const, permissions: ['view_reports' as const] };

    expect(hasPermission(admin, 'view_reports')).toBe(true);
    expect(hasPermission(admin, 'add_user')).toBe(false);
    expect(() => requirePermission(admin, 'add_user')).toThrow(ForbiddenError);
  });

  it('validates user-supplied names and removes duplicates', () => {
    expect(validatePermissions(['add_book', ' add_book', ''])).toEqual(['add_book']);
    expect(() => validatePermissions(['add_book', 'fly', 'swim'])).toThrow(
      new ValidationError('Invalid permissions: fly, swim')
    );
  });
});
