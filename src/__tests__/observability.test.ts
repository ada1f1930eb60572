/**
 * Tests for logging and metrics.
 */

import {
  InMemoryLogger,
  ConsoleLogger,
  NoopLogger,
  LogLevel,
  parseLogLevel,
  redactSensitive,
  InMemoryMetricsCollector,
  NoopMetricsCollector,
  MetricNames,
} from '../index.js';

describe('Logging', () => {
  describe('parseLogLevel', () => {
    it('should parse level names case-insensitively', () => {
      expect(parseLogLevel('trace')).toBe(LogLevel.Trace);
      expect(parseLogLevel('DEBUG')).toBe(LogLevel.Debug);
      expect(parseLogLevel(' info ')).toBe(LogLevel.Info);
      expect(parseLogLevel('warning')).toBe(LogLevel.Warn);
      expect(parseLogLevel('Error')).toBe(LogLevel.Error);
    });

    it('should return undefined for unknown names', () => {
      expect(parseLogLevel('verbose')).toBeUndefined();
    });
  });

  describe('redactSensitive', () => {
    it('should redact webhook URLs and tokens at any depth', () => {
      const redacted = redactSensitive({
        webhookUrl: 'https://discord.com/api/webhooks/1/test-token',
        request: { Authorization: 'test-secret', method: 'POST' },
        tags: ['a', 'b'],
      });

      expect(redacted).toEqual({
        webhookUrl: '[REDACTED]',
        request: { Authorization: '[REDACTED]', method: 'POST' },
        tags: ['a', 'b'],
      });
    });
  });

  describe('InMemoryLogger', () => {
    it('should capture logs', () => {
      const logger = new InMemoryLogger();
      logger.info('test message', { key: 'value' });

      const logs = logger.getLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0].level).toBe(LogLevel.Info);
      expect(logs[0].message).toBe('test message');
      expect(logs[0].context).toEqual({ key: 'value' });
    });

    it('should filter by level', () => {
      const logger = new InMemoryLogger();
      logger.trace('trace');
      logger.debug('debug');
      logger.warn('warn');
      logger.error('error');

      expect(logger.getLogsByLevel(LogLevel.Warn).map((entry) => entry.message)).toEqual(['warn']);
    });

    it('should merge child context and share entries', () => {
      const logger = new InMemoryLogger({ component: 'client' });
      const child = logger.child({ operation: 'webhook:execute' });

      logger.info('parent');
      child.info('child', { attempt: 1 });

      const logs = logger.getLogs();
      expect(logs).toHaveLength(2);
      expect(logs[1].context).toEqual({
        component: 'client',
        operation: 'webhook:execute',
        attempt: 1,
      });
    });

    it('should clear logs', () => {
      const logger = new InMemoryLogger();
      logger.info('test');
      logger.clear();

      expect(logger.getLogs()).toHaveLength(0);
    });
  });

  describe('ConsoleLogger', () => {
    it('should write pretty lines', () => {
      const lines: string[] = [];
      const logger = new ConsoleLogger({ level: LogLevel.Info, write: (line) => lines.push(line) });

      logger.info('sent', { status: 204 });
      logger.warn('bare');

      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] INFO: sent \{"status":204\}$/);
      expect(lines[1]).toMatch(/\] WARN: bare$/);
    });

    it('should filter by log level', () => {
      const lines: string[] = [];
      const logger = new ConsoleLogger({ level: LogLevel.Warn, write: (line) => lines.push(line) });

      logger.trace('trace');
      logger.debug('debug');
      logger.info('info');
      logger.warn('warn');
      logger.error('error');

      expect(lines).toHaveLength(2);
    });

    it('should redact sensitive fields', () => {
      const lines: string[] = [];
      const logger = new ConsoleLogger({ write: (line) => lines.push(line) });

      logger.info('test', { token: 'test-token', normal: 'value' });

      expect(lines[0]).toMatch(/ \{"token":"\[REDACTED\]","normal":"value"\}$/);
    });

    it('should output JSON format with child context', () => {
      const lines: string[] = [];
      const logger = new ConsoleLogger({ format: 'json', write: (line) => lines.push(line) }).child({
        webhookId: '123456789012345678',
      });

      logger.error('failed', { url: 'https://example.com', status: 500 });

      const parsed: unknown = JSON.parse(lines[0]);
      expect(parsed).toMatchObject({
        level: 'ERROR',
        message: 'failed',
        webhookId: '123456789012345678',
        url: '[REDACTED]',
        status: 500,
      });
    });

    it('should write to console.log by default', () => {
      const consoleSpy = jest.spyOn(console, 'log').mockImplementation();
      try {
        new ConsoleLogger().info('default sink');

        expect(consoleSpy).toHaveBeenCalledTimes(1);
        expect(consoleSpy.mock.calls[0][0]).toMatch(/INFO: default sink$/);
      } finally {
        consoleSpy.mockRestore();
      }
    });
  });

  describe('NoopLogger', () => {
    it('should not throw', () => {
      const logger = new NoopLogger();
      expect(() => {
        logger.trace('test');
        logger.debug('test');
        logger.info('test');
        logger.warn('test');
        logger.error('test');
        logger.child({}).info('child');
      }).not.toThrow();
    });
  });
});

describe('Metrics', () => {
  describe('InMemoryMetricsCollector', () => {
    it('should increment counters', () => {
      const metrics = new InMemoryMetricsCollector();
      metrics.incrementCounter(MetricNames.MESSAGES_SENT);
      metrics.incrementCounter(MetricNames.MESSAGES_SENT, 3);

      expect(metrics.getCounter(MetricNames.MESSAGES_SENT)).toBe(4);
      expect(metrics.getCounter(MetricNames.MESSAGES_REJECTED)).toBe(0);
    });

    it('should key by labels regardless of order', () => {
      const metrics = new InMemoryMetricsCollector();
      metrics.incrementCounter(MetricNames.REQUESTS_TOTAL, 1, { operation: 'webhook:get', method: 'GET' });
      metrics.incrementCounter(MetricNames.REQUESTS_TOTAL, 1, { method: 'GET', operation: 'webhook:get' });
      metrics.incrementCounter(MetricNames.REQUESTS_TOTAL, 1, { operation: 'webhook:execute' });

      expect(
        metrics.getCounter(MetricNames.REQUESTS_TOTAL, { method: 'GET', operation: 'webhook:get' })
      ).toBe(2);
      expect(metrics.getCounter(MetricNames.REQUESTS_TOTAL)).toBe(0);
    });

    it('should record histogram values', () => {
      const metrics = new InMemoryMetricsCollector();
      metrics.recordHistogram(MetricNames.REQUEST_LATENCY, 0.1);
      metrics.recordHistogram(MetricNames.REQUEST_LATENCY, 0.25);

      expect(metrics.getHistogram(MetricNames.REQUEST_LATENCY)).toEqual([0.1, 0.25]);
    });

    it('should clear all metrics', () => {
      const metrics = new InMemoryMetricsCollector();
      metrics.incrementCounter('a');
      metrics.recordHistogram('b', 1);
      metrics.clear();

      expect(metrics.getCounter('a')).toBe(0);
      expect(metrics.getHistogram('b')).toEqual([]);
    });
  });

  describe('NoopMetricsCollector', () => {
    it('should not throw', () => {
      const metrics = new NoopMetricsCollector();
      expect(() => {
        metrics.incrementCounter('a');
        metrics.recordHistogram('b', 1);
      }).not.toThrow();
    });
  });
});
