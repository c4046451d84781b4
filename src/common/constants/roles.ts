export const USER_ROLES = ['user', 'staff', 'admin'] as const;

export type UserRole = (typeof USER_ROLES)[number];

/** Roles allowed to read statistics and reset the demo state. */
export const ADMIN_ROLES: readonly UserRole[] = ['admin', 'staff'];

export function isUserRole(value: unknown): value is UserRole {
  return typeof value === 'string' && USER_ROLES.some((role) => role === value);
}
