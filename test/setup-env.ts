process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
process.env.STORAGE_DRIVER = 'memory';
process.env.JWT_SECRET = 'test-secret';
process.env.PASSWORD_HASH_ALGORITHM = 'bcrypt';
process.env.BCRYPT_SALT_ROUNDS = '4';
process.env.ADMIN_EMAIL = 'admin@parking.test';
process.env.ADMIN_PASSWORD = 'AdminPass1';
