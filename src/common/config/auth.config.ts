import { registerAs } from '@nestjs/config';

export const PASSWORD_HASH_ALGORITHMS = ['scrypt', 'bcrypt'] as const;

export type PasswordHashAlgorithm = (typeof PASSWORD_HASH_ALGORITHMS)[number];

export interface AuthConfig {
  jwtSecret: string;
  accessTokenTtlSeconds: number;
  passwordHashAlgorithm: PasswordHashAlgorithm;
  bcryptSaltRounds: number;
  admin: {
    email: string;
    password: string;
    fullName: string;
  } | null;
}

const DEFAULT_ACCESS_TOKEN_TTL_SECONDS = 60 * 60; // 1 hour
const DEFAULT_BCRYPT_SALT_ROUNDS = 10;

function positiveInteger(value: string | undefined, fallback: number, key: string): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new Error(`Invalid positive integer value for ${key}: ${value}`);
  }
  return parsed;
}

export default registerAs('auth', (): AuthConfig => {
  const algorithm = process.env.PASSWORD_HASH_ALGORITHM ?? 'scrypt';
  const passwordHashAlgorithm = PASSWORD_HASH_ALGORITHMS.find((candidate) => candidate === algorithm);
  if (!passwordHashAlgorithm) {
    throw new Error(`PASSWORD_HASH_ALGORITHM must be one of: ${PASSWORD_HASH_ALGORITHMS.join(', ')}`);
  }

  const adminEmail = process.env.ADMIN_EMAIL?.trim().toLowerCase();
  const adminPassword = process.env.ADMIN_PASSWORD;

  return {
    jwtSecret: process.env.JWT_SECRET ?? 'dev-secret-change-me',
    accessTokenTtlSeconds: positiveInteger(
      process.env.JWT_ACCESS_TTL_SECONDS,
      DEFAULT_ACCESS_TOKEN_TTL_SECONDS,
      'JWT_ACCESS_TTL_SECONDS',
    ),
    passwordHashAlgorithm,
    bcryptSaltRounds: positiveInteger(process.env.BCRYPT_SALT_ROUNDS, DEFAULT_BCRYPT_SALT_ROUNDS, 'BCRYPT_SALT_ROUNDS'),
    admin: adminEmail && adminPassword
      ? {
        email: adminEmail,
        password: adminPassword,
        fullName: process.env.ADMIN_FULL_NAME ?? 'System Administrator',
      }
      : null,
  };
});
