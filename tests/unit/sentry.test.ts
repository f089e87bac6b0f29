/**
 * Unit tests for Sentry error tracking module
 */

jest.mock('@sentry/node', () => ({
  init: jest.fn(),
  captureException: jest.fn(() => 'event-id'),
  captureMessage: jest.fn(() => 'event-id'),
  addBreadcrumb: jest.fn(),
  setTag: jest.fn(),
  startSpan: jest.fn((_options: unknown, callback: () => unknown) => callback()),
  flush: jest.fn().mockResolvedValue(true),
}));

import * as Sentry from '@sentry/node';
import * as sentry from '../../src/lib/utils/sentry';

const originalEnv = process.env;

describe('Sentry Module', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    process.env = { ...originalEnv };
    delete process.env.SENTRY_DSN;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('without DSN', () => {
    it('should stay disabled', () => {
      sentry.initializeSentry();
      expect(sentry.isSentryEnabled()).toBe(false);
      expect(Sentry.init).not.toHaveBeenCalled();
    });

    it('should not forward captures', () => {
      expect(sentry.captureException(new Error('Test error'), { file: 'a.md' })).toBeUndefined();
      expect(sentry.captureMessage('Test message', 'warning')).toBeUndefined();
      sentry.addBreadcrumb('Test breadcrumb', 'build', 'info');
      sentry.setTag('related_posts', 'naive');

      expect(Sentry.captureException).not.toHaveBeenCalled();
      expect(Sentry.captureMessage).not.toHaveBeenCalled();
      expect(Sentry.addBreadcrumb).not.toHaveBeenCalled();
      expect(Sentry.setTag).not.toHaveBeenCalled();
    });

    it('should run spans without Sentry', async () => {
      await expect(sentry.withSpan('site.build', 'build', async () => 42)).resolves.toBe(42);
      expect(Sentry.startSpan).not.toHaveBeenCalled();
    });

    it('should complete flush without errors', async () => {
      await expect(sentry.flushSentry()).resolves.toBe(true);
      expect(Sentry.flush).not.toHaveBeenCalled();
    });
  });

  describe('with DSN', () => {
    let enabled: typeof sentry;

    beforeEach(async () => {
      process.env.SENTRY_DSN = 'https://public@sentry.example.com/1';
      jest.spyOn(console, 'info').mockImplementation();
      await jest.isolateModulesAsync(async () => {
        enabled = await import('../../src/lib/utils/sentry');
      });
      enabled.initializeSentry();
    });

    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should initialize once', () => {
      enabled.initializeSentry();
      expect(enabled.isSentryEnabled()).toBe(true);
      expect(Sentry.init).toHaveBeenCalledTimes(1);
    });

    it('should forward exceptions with context', () => {
      const error = new Error('Test error');
      expect(enabled.captureException(error, { file: 'a.md' })).toBe('event-id');
      expect(Sentry.captureException).toHaveBeenCalledWith(error, { extra: { file: 'a.md' } });
    });

    it('should run spans through Sentry', async () => {
      await expect(enabled.withSpan('site.build', 'build', async () => 'done')).resolves.toBe('done');
      expect(Sentry.startSpan).toHaveBeenCalledWith({ name: 'site.build', op: 'build' }, expect.any(Function));
    });

    it('should flush with timeout', async () => {
      await expect(enabled.flushSentry(5000)).resolves.toBe(true);
      expect(Sentry.flush).toHaveBeenCalledWith(5000);
    });
  });
});
