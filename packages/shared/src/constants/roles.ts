import type { UserRole } from '../types/auth.js';

export const ROLES: Record<UserRole, { label: string; level: number }> = {
  user: { label: 'User', level: 1 },
  admin: { label: 'Administrator', level: 2 },
};

export function hasRole(userRole: UserRole, requiredRole: UserRole): boolean {
  return ROLES[userRole].level >= ROLES[requiredRole].level;
}
