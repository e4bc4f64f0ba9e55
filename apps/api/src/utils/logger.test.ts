import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, formatMessage, redactSecrets } from './logger';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('redactSecrets', () => {
    it('should hide API keys and bot tokens', () => {
      expect(redactSecrets('headers: {"x-api-key": "test-api-key"}')).toBe('headers: {"x-api-key: <REDACTED>"}');
      expect(redactSecrets('Authorization: Bot test-token')).toBe('authorization: <REDACTED>');
    });

    it('should hide secrets named in environment assignments', () => {
      expect(redactSecrets('JWT_ACCESS_SECRET=test-secret loaded')).toBe('JWT_ACCESS_SECRET=<REDACTED> loaded');
    });

    it('should leave ordinary text alone', () => {
      expect(redactSecrets('Synced member-1: Recruit -> Private')).toBe('Synced member-1: Recruit -> Private');
    });
  });

  describe('formatMessage', () => {
    it('should serialize errors passed as arguments', () => {
      const line = formatMessage('error', 'Sync failed:', [new Error('boom')], false);

      expect(line).toMatch(/^\[.+\] \[ERROR\] Sync failed: \[\{"name":"Error","message":"boom"\}\]$/);
    });
  });

  describe('createLogger', () => {
    it('should drop messages below the configured level', () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const log = createLogger({ level: 'warn', colors: false });

      log.info('hidden');
      log.warn('shown');

      expect(info).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toMatch(/\[WARN \] shown$/);
    });
  });
});
