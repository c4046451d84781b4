import type { SafeUser } from '../../users/entities/user.entity';

export type TokenContext = {
  ip?: string | null;
  userAgent?: string | null;
};

export type AccessToken = {
  accessToken: string;
  accessTokenExpiresAt: string;
};

export type AuthResult = AccessToken & {
  success: true;
  user: SafeUser;
};

export type RegisterResult = AuthResult & {
  userId: string;
};

export type CheckAuthResult =
  | { authenticated: true; user: SafeUser }
  | { authenticated: false };
