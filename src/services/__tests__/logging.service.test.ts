/**
 * Logging Service Tests
 */

import {
  configureLogging,
  getLoggingService,
  LoggingService,
  resetLoggingService,
} from '../logging.service';

interface LogRecord {
  level: string;
  module?: string;
  userId?: string;
  msg: string;
  err?: { message: string };
  [key: string]: unknown;
}

const createCapture = () => {
  const lines: string[] = [];
  return {
    destination: { write: (line: string) => void lines.push(line) },
    records: (): LogRecord[] => lines.map((line) => JSON.parse(line)),
  };
};

describe('LoggingService', () => {
  let capture: ReturnType<typeof createCapture>;
  let service: LoggingService;

  beforeEach(() => {
    capture = createCapture();
    service = new LoggingService({ level: 'debug', destination: capture.destination });
  });

  it('should tag lines with the module and level label', () => {
    service.createLogger('Auth').info('Sign-in successful', { provider: 'email' });

    const [record] = capture.records();
    expect(record).toMatchObject({
      level: 'info',
      module: 'Auth',
      msg: 'Sign-in successful',
      provider: 'email',
      name: 'auth',
    });
  });

  it('should attach the user ID once set', () => {
    const log = service.createLogger('Session');
    log.info('before');
    service.setUserId('user-123');
    log.info('after');
    service.setUserId(null);
    log.info('cleared');

    const records = capture.records();
    expect(records[0]?.userId).toBeUndefined();
    expect(records[1]?.userId).toBe('user-123');
    expect(records[2]?.userId).toBeUndefined();
    expect(service.getUserId()).toBeNull();
  });

  it('should redact credentials', () => {
    service.createLogger('API').debug('Request', {
      password: 'test-secret',
      accessToken: 'test-access-token',
      body: { access_token: 'test-access-token', email: 'test@example.com' },
    });

    const [record] = capture.records();
    expect(record?.password).toBe('[REDACTED]');
    expect(record?.accessToken).toBe('[REDACTED]');
    expect(record?.body).toEqual({ access_token: '[REDACTED]', email: 'test@example.com' });
  });

  it('should serialize errors and wrap non-Error values', () => {
    const log = service.createLogger('Storage');
    log.error('Failed to set key', new Error('disk full'));
    log.error('Failed to remove key', 'permission denied');

    const records = capture.records();
    expect(records[0]).toMatchObject({ level: 'error', err: { message: 'disk full' } });
    expect(records[1]?.err?.message).toBe('permission denied');
  });

  it('should respect the configured level', () => {
    service.configure({ level: 'warn', destination: capture.destination });
    const log = service.createLogger('App');
    log.info('hidden');
    log.warn('shown');

    expect(capture.records().map((record) => record.msg)).toEqual(['shown']);
  });

  describe('shared instance', () => {
    afterEach(() => {
      resetLoggingService();
      configureLogging({ level: 'silent' });
    });

    it('should keep loggers created before a reset attached to the shared service', () => {
      const log = getLoggingService().createLogger('App');

      resetLoggingService();
      configureLogging({ level: 'debug', destination: capture.destination });
      getLoggingService().setUserId('user-9');
      log.info('After reset');

      expect(capture.records()).toEqual([
        expect.objectContaining({ module: 'App', userId: 'user-9', msg: 'After reset' }),
      ]);
    });

    it('should drop the user ID on reset', () => {
      getLoggingService().setUserId('user-9');

      resetLoggingService();

      expect(getLoggingService().getUserId()).toBeNull();
    });
  });
});
