import databaseConfig, { readDatabaseSettings, toPoolConfig } from './database.config';

describe('database configuration', () => {
  it('should fall back to local defaults', () => {
    expect(toPoolConfig(readDatabaseSettings({}))).toEqual({
      host: 'localhost',
      port: 5432,
      user: 'postgres',
      password: '',
      database: 'parking',
      ssl: undefined,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
      statement_timeout: 10000,
      application_name: 'parking-booking-api',
    });
  });

  it('should read connection settings from the environment', () => {
    const pool = toPoolConfig(readDatabaseSettings({
      POSTGRES_HOST: 'db',
      POSTGRES_PORT: '6543',
      POSTGRES_USER: 'parking',
      POSTGRES_PASSWORD: 'test-password',
      POSTGRES_DB: 'parking_test',
      POSTGRES_SSL: 'true',
      POSTGRES_POOL_MAX: '3',
      POSTGRES_STATEMENT_TIMEOUT: '2500',
    }));

    expect(pool).toMatchObject({
      host: 'db',
      port: 6543,
      user: 'parking',
      password: 'test-password',
      database: 'parking_test',
      ssl: true,
      max: 3,
      statement_timeout: 2500,
    });
  });

  it('should prefer DATABASE_URL over the discrete fields', () => {
    const pool = toPoolConfig(readDatabaseSettings({
      DATABASE_URL: 'postgres://parking:test-password@db:5432/parking',
      POSTGRES_HOST: 'ignored',
    }));

    expect(pool.connectionString).toBe('postgres://parking:test-password@db:5432/parking');
    expect(pool.host).toBeUndefined();
  });

  it('should reject non-numeric and non-positive values', () => {
    expect(() => readDatabaseSettings({ POSTGRES_PORT: 'five' })).toThrow(
      'POSTGRES_PORT must be a positive integer',
    );
    expect(() => readDatabaseSettings({ POSTGRES_POOL_MAX: '0' })).toThrow(
      'POSTGRES_POOL_MAX must be a positive integer',
    );
  });

  it('should register the database namespace', () => {
    expect(databaseConfig.KEY).toBe('CONFIGURATION(database)');
  });
});
