import * as winston from 'winston';
import {
  REDACTED,
  createLogTransports,
  redactSecrets,
  redactSensitive,
  resolveLogSettings,
} from './logger.service';

describe('logger', () => {
  describe('redactSensitive', () => {
    it('should replace credential fields at any depth', () => {
      expect(
        redactSensitive({
          email: 'driver@parking.test',
          password: 'Passw0rd1',
          user: { id: 'user-1', password_hash: 'salt:hash' },
          attempts: [{ accessToken: 'test-token', ok: false }],
        }),
      ).toEqual({
        email: 'driver@parking.test',
        password: REDACTED,
        user: { id: 'user-1', password_hash: REDACTED },
        attempts: [{ accessToken: REDACTED, ok: false }],
      });
    });

    it('should leave dates and other instances untouched', () => {
      const bookedAt = new Date('2024-06-15T12:00:00Z');

      expect(redactSensitive({ bookedAt })).toEqual({ bookedAt });
      expect(redactSensitive('Passw0rd1')).toBe('Passw0rd1');
    });
  });

  describe('redactSecrets format', () => {
    it('should scrub metadata but keep the message', () => {
      const info = redactSecrets().transform({
        level: 'info',
        message: 'Business Event: user_registered',
        passwordHash: 'salt:hash',
        data: { email: 'driver@parking.test', password: 'Passw0rd1' },
      });

      expect(info).toEqual({
        level: 'info',
        message: 'Business Event: user_registered',
        passwordHash: REDACTED,
        data: { email: 'driver@parking.test', password: REDACTED },
      });
    });
  });

  describe('resolveLogSettings', () => {
    it('should log at debug with pretty output in development', () => {
      expect(resolveLogSettings({ NODE_ENV: 'development' })).toEqual({
        level: 'debug',
        pretty: true,
        writeFiles: false,
        directory: 'logs',
      });
    });

    it('should write files in production or on request', () => {
      expect(resolveLogSettings({ NODE_ENV: 'production' })).toMatchObject({ level: 'info', writeFiles: true });
      expect(resolveLogSettings({ NODE_ENV: 'test', LOG_FILES: 'true', LOG_DIR: '/var/log/parking' })).toMatchObject({
        writeFiles: true,
        directory: '/var/log/parking',
      });
    });

    it('should honour an explicit level', () => {
      expect(resolveLogSettings({ NODE_ENV: 'development', LOG_LEVEL: 'warn' }).level).toBe('warn');
    });
  });

  it('should only log to the console when files are off', () => {
    const transports = createLogTransports({ level: 'info', pretty: false, writeFiles: false, directory: 'logs' });

    expect(transports).toHaveLength(1);
    expect(transports[0]).toBeInstanceOf(winston.transports.Console);
  });
});
