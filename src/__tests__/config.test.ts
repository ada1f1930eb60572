/**
 * Tests for webhook configuration.
 */

import {
  WebhookConfigBuilder,
  SecretString,
  parseWebhookUrl,
  buildWebhookUrl,
  ConfigurationError,
  LogLevel,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
} from '../index.js';

const WEBHOOK_URL = 'https://discord.com/api/webhooks/123456789012345678/test-token';

describe('SecretString', () => {
  it('should hide value in toString()', () => {
    const secret = new SecretString('test-secret');
    expect(secret.toString()).toBe('[REDACTED]');
    expect(`${secret}`).toBe('[REDACTED]');
  });

  it('should hide value in JSON', () => {
    const secret = new SecretString('test-secret');
    expect(JSON.stringify({ url: secret })).toBe('{"url":"[REDACTED]"}');
  });

  it('should expose value with expose()', () => {
    expect(new SecretString('test-secret').expose()).toBe('test-secret');
  });
});

describe('WebhookConfigBuilder', () => {
  describe('basic configuration', () => {
    it('should build config with defaults', () => {
      const config = new WebhookConfigBuilder().withWebhook(WEBHOOK_URL).build();

      expect(config).toEqual({
        webhookUrl: WEBHOOK_URL,
        requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
        userAgent: DEFAULT_USER_AGENT,
        logLevel: undefined,
      });
    });

    it('should apply every setter', () => {
      const config = new WebhookConfigBuilder()
        .withWebhook(`  ${WEBHOOK_URL}  `)
        .withRequestTimeout(5000)
        .withUserAgent('release-bot/2.0')
        .withLogLevel(LogLevel.Debug)
        .build();

      expect(config.webhookUrl).toBe(WEBHOOK_URL);
      expect(config.requestTimeoutMs).toBe(5000);
      expect(config.userAgent).toBe('release-bot/2.0');
      expect(config.logLevel).toBe(LogLevel.Debug);
    });

    it('should accept versioned and canary URLs', () => {
      expect(() =>
        new WebhookConfigBuilder().withWebhook(
          'https://canary.discord.com/api/v10/webhooks/123456789012345678/test-token'
        )
      ).not.toThrow();
      expect(() =>
        new WebhookConfigBuilder().withWebhook(
          'https://discordapp.com/api/webhooks/123456789012345678/test_token'
        )
      ).not.toThrow();
    });
  });

  describe('validation', () => {
    it('should fail without a webhook URL', () => {
      expect(() => new WebhookConfigBuilder().build()).toThrow(ConfigurationError);
      expect(() => new WebhookConfigBuilder().build()).toThrow(
        'Configuration error: No webhook URL configured'
      );
    });

    it('should reject an empty URL', () => {
      expect(() => new WebhookConfigBuilder().withWebhook('   ')).toThrow(
        'Webhook URL cannot be empty'
      );
    });

    it('should reject a URL that is not a webhook URL', () => {
      expect(() => new WebhookConfigBuilder().withWebhook('https://example.com/hook')).toThrow(
        'Invalid webhook URL format'
      );
      expect(() =>
        new WebhookConfigBuilder().withWebhook('http://discord.com/api/webhooks/1/test-token')
      ).toThrow(ConfigurationError);
    });

    it('should reject a non-positive timeout', () => {
      expect(() => new WebhookConfigBuilder().withRequestTimeout(0)).toThrow(ConfigurationError);
      expect(() => new WebhookConfigBuilder().withRequestTimeout(-1)).toThrow(ConfigurationError);
      expect(() => new WebhookConfigBuilder().withRequestTimeout(Number.NaN)).toThrow(
        ConfigurationError
      );
    });

    it('should reject an empty user agent', () => {
      expect(() => new WebhookConfigBuilder().withUserAgent('')).toThrow(ConfigurationError);
    });
  });

  describe('fromEnv', () => {
    it('should read every variable', () => {
      const config = WebhookConfigBuilder.fromEnv({
        WEBHOOK_URL,
        WEBHOOK_REQUEST_TIMEOUT_MS: '1500',
        WEBHOOK_USER_AGENT: 'env-agent/1.0',
        WEBHOOK_LOG_LEVEL: 'warning',
      }).build();

      expect(config).toEqual({
        webhookUrl: WEBHOOK_URL,
        requestTimeoutMs: 1500,
        userAgent: 'env-agent/1.0',
        logLevel: LogLevel.Warn,
      });
    });

    it('should keep defaults for unset variables', () => {
      const config = WebhookConfigBuilder.fromEnv({ WEBHOOK_URL }).build();

      expect(config.requestTimeoutMs).toBe(DEFAULT_REQUEST_TIMEOUT_MS);
      expect(config.userAgent).toBe(DEFAULT_USER_AGENT);
      expect(config.logLevel).toBeUndefined();
    });

    it('should return a builder that still needs a URL', () => {
      expect(() => WebhookConfigBuilder.fromEnv({}).build()).toThrow('No webhook URL configured');
    });

    it('should reject a malformed timeout', () => {
      expect(() =>
        WebhookConfigBuilder.fromEnv({ WEBHOOK_URL, WEBHOOK_REQUEST_TIMEOUT_MS: 'soon' })
      ).toThrow(/^Configuration error: WEBHOOK_REQUEST_TIMEOUT_MS: /);
    });

    it('should reject an unknown log level', () => {
      expect(() => WebhookConfigBuilder.fromEnv({ WEBHOOK_URL, WEBHOOK_LOG_LEVEL: 'loud' })).toThrow(
        'Configuration error: WEBHOOK_LOG_LEVEL: Expected one of trace, debug, info, warn, error'
      );
    });
  });
});

describe('parseWebhookUrl', () => {
  it('should extract id and token', () => {
    expect(parseWebhookUrl(WEBHOOK_URL)).toEqual({
      webhookId: '123456789012345678',
      webhookToken: 'test-token',
    });
  });

  it('should throw on invalid URLs', () => {
    expect(() => parseWebhookUrl('not-a-url')).toThrow(ConfigurationError);
  });
});

describe('buildWebhookUrl', () => {
  it('should use the versioned API base by default', () => {
    expect(buildWebhookUrl('123456789012345678', 'test-token')).toBe(
      'https://discord.com/api/v10/webhooks/123456789012345678/test-token'
    );
  });

  it('should round-trip through parseWebhookUrl', () => {
    const url = buildWebhookUrl('42424242424242424', 'test-token', 'https://discord.com/api');
    expect(parseWebhookUrl(url).webhookId).toBe('42424242424242424');
  });
});
