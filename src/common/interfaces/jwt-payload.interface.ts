import { UserRole } from '../constants/roles';

export type JwtPayload = {
  sub: string;
  email: string;
  role: UserRole;
  fullName?: string | null;
  tokenType?: 'access';
};

/**
 * Identity resolved once by the JWT guard and handed to controllers.
 */
export type AuthenticatedUser = {
  id: string;
  email: string;
  role: UserRole;
  fullName: string | null;
};
