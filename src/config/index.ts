/**
 * Webhook client configuration and builder.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { LogLevel, parseLogLevel } from '../observability/index.js';
import { Snowflake } from '../types/index.js';

/**
 * Webhook client configuration.
 */
export interface WebhookConfig {
  /** Webhook URL, including its token */
  webhookUrl: string;
  /** Request timeout in milliseconds */
  requestTimeoutMs: number;
  /** User agent string */
  userAgent: string;
  /** Level for the default console logger; logging is off when unset */
  logLevel?: LogLevel;
}

/**
 * Default user agent for requests.
 */
export const DEFAULT_USER_AGENT = 'webhook-message-kit/1.0.0';

/**
 * Default request timeout.
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

/**
 * Webhook URL format: https://discord.com/api[/v{n}]/webhooks/{id}/{token}
 */
const WEBHOOK_URL_PATTERN =
  /^https:\/\/(?:(?:canary|ptb)\.)?(?:discord\.com|discordapp\.com)\/api(?:\/v\d+)?\/webhooks\/(\d+)\/([\w-]+)$/;

/**
 * Environment variables read by {@link WebhookConfigBuilder.fromEnv}.
 */
const EnvSchema = z.object({
  WEBHOOK_URL: z.string().trim().min(1).optional(),
  WEBHOOK_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  WEBHOOK_USER_AGENT: z.string().trim().min(1).optional(),
  WEBHOOK_LOG_LEVEL: z
    .string()
    .refine((value) => parseLogLevel(value) !== undefined, {
      message: 'Expected one of trace, debug, info, warn, error',
    })
    .optional(),
});

/**
 * SecretString wrapper to prevent accidental logging of sensitive values.
 * The value is only accessible via the expose() method.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value. Use with caution.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

/**
 * Builder for webhook client configuration.
 */
export class WebhookConfigBuilder {
  private webhookUrl?: SecretString;
  private requestTimeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS;
  private userAgent: string = DEFAULT_USER_AGENT;
  private logLevel?: LogLevel;

  /**
   * Sets the webhook URL.
   * @throws ConfigurationError if the URL is empty or not a webhook URL
   */
  withWebhook(url: string): this {
    if (!url || url.trim().length === 0) {
      throw new ConfigurationError('Webhook URL cannot be empty');
    }
    if (!WEBHOOK_URL_PATTERN.test(url.trim())) {
      throw new ConfigurationError('Invalid webhook URL format');
    }
    this.webhookUrl = new SecretString(url.trim());
    return this;
  }

  /**
   * Sets the request timeout.
   * @param timeoutMs - Timeout in milliseconds
   */
  withRequestTimeout(timeoutMs: number): this {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError('Request timeout must be positive');
    }
    this.requestTimeoutMs = timeoutMs;
    return this;
  }

  /**
   * Sets the user agent string.
   */
  withUserAgent(userAgent: string): this {
    if (userAgent.trim().length === 0) {
      throw new ConfigurationError('User agent cannot be empty');
    }
    this.userAgent = userAgent;
    return this;
  }

  /**
   * Enables console logging at the given level.
   */
  withLogLevel(level: LogLevel): this {
    this.logLevel = level;
    return this;
  }

  /**
   * Creates a builder from environment variables.
   *
   * Environment variables:
   * - WEBHOOK_URL: Webhook URL
   * - WEBHOOK_REQUEST_TIMEOUT_MS: Request timeout (optional)
   * - WEBHOOK_USER_AGENT: User agent (optional)
   * - WEBHOOK_LOG_LEVEL: Console log level (optional)
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): WebhookConfigBuilder {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigurationError(`${issue.path.join('.')}: ${issue.message}`);
    }

    const builder = new WebhookConfigBuilder();
    const { WEBHOOK_URL, WEBHOOK_REQUEST_TIMEOUT_MS, WEBHOOK_USER_AGENT, WEBHOOK_LOG_LEVEL } =
      parsed.data;

    if (WEBHOOK_URL) builder.withWebhook(WEBHOOK_URL);
    if (WEBHOOK_REQUEST_TIMEOUT_MS) builder.withRequestTimeout(WEBHOOK_REQUEST_TIMEOUT_MS);
    if (WEBHOOK_USER_AGENT) builder.withUserAgent(WEBHOOK_USER_AGENT);
    if (WEBHOOK_LOG_LEVEL) {
      const level = parseLogLevel(WEBHOOK_LOG_LEVEL);
      if (level !== undefined) builder.withLogLevel(level);
    }

    return builder;
  }

  /**
   * Builds the configuration.
   * @throws ConfigurationError if no webhook URL is configured
   */
  build(): WebhookConfig {
    if (!this.webhookUrl) {
      throw new ConfigurationError('No webhook URL configured');
    }

    return {
      webhookUrl: this.webhookUrl.expose(),
      requestTimeoutMs: this.requestTimeoutMs,
      userAgent: this.userAgent,
      logLevel: this.logLevel,
    };
  }
}

/**
 * Parses a webhook URL to extract the webhook ID and token.
 * @throws ConfigurationError if the URL is invalid
 */
export function parseWebhookUrl(url: string): { webhookId: Snowflake; webhookToken: string } {
  const match = url.trim().match(WEBHOOK_URL_PATTERN);
  if (!match) {
    throw new ConfigurationError('Invalid webhook URL format');
  }
  return {
    webhookId: match[1],
    webhookToken: match[2],
  };
}

/**
 * Builds a webhook URL from ID and token.
 */
export function buildWebhookUrl(
  webhookId: Snowflake,
  webhookToken: string,
  baseUrl: string = 'https://discord.com/api/v10'
): string {
  return `${baseUrl}/webhooks/${webhookId}/${webhookToken}`;
}
