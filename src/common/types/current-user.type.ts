import { USER_ROLES, UserRole } from '../../database/schema';

export interface CurrentUserPayload {
  userId: string;
  role: UserRole;
  phone: string;
}

export function isUserRole(value: unknown): value is UserRole {
  return USER_ROLES.some((role) => role === value);
}

export function isCurrentUser(value: unknown): value is CurrentUserPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'userId' in value &&
    typeof value.userId === 'string' &&
    'role' in value &&
    isUserRole(value.role)
  );
}
