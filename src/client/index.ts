/**
 * Webhook client - main entry point for sending messages.
 */

import { z } from 'zod';
import { MessageBuilder } from '../builders/index.js';
import { WebhookConfig, WebhookConfigBuilder, parseWebhookUrl } from '../config/index.js';
import { InvalidInputError, ResponseParseError } from '../errors/index.js';
import {
  ConsoleLogger,
  Logger,
  MetricNames,
  MetricsCollector,
  NoopLogger,
  NoopMetricsCollector,
} from '../observability/index.js';
import { toWebhookPayload } from '../serialization/index.js';
import { WebhookTransport } from '../transport/index.js';
import {
  SentMessage,
  SentMessageSchema,
  Snowflake,
  WebhookInfo,
  WebhookInfoSchema,
} from '../types/index.js';
import { validateMessage } from '../validation/index.js';

/**
 * Webhook client options.
 */
export interface WebhookClientOptions {
  /** Logger instance */
  logger?: Logger;
  /** Metrics collector instance */
  metrics?: MetricsCollector;
}

/**
 * Options for a single send.
 */
export interface SendOptions {
  /** Wait for the message to be created and return it */
  wait?: boolean;
  /** Post into this thread of the webhook's channel */
  threadId?: Snowflake;
}

/**
 * Client for one webhook URL.
 *
 * Every send validates the message with a fresh validation context before
 * anything is serialized; an invalid message never reaches the network.
 */
export class WebhookClient {
  private readonly transport: WebhookTransport;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly webhookId: Snowflake;

  private constructor(config: WebhookConfig, logger: Logger, metrics: MetricsCollector) {
    this.logger = logger;
    this.metrics = metrics;
    this.webhookId = parseWebhookUrl(config.webhookUrl).webhookId;
    this.transport = new WebhookTransport({ config, logger, metrics });
  }

  /**
   * Creates a new webhook client.
   */
  static create(config: WebhookConfig, options: WebhookClientOptions = {}): WebhookClient {
    const logger =
      options.logger ??
      (config.logLevel !== undefined ? new ConsoleLogger({ level: config.logLevel }) : new NoopLogger());
    const metrics = options.metrics ?? new NoopMetricsCollector();
    return new WebhookClient(config, logger, metrics);
  }

  /**
   * Creates a client for a webhook URL with default settings.
   */
  static fromUrl(url: string, options?: WebhookClientOptions): WebhookClient {
    return WebhookClient.create(new WebhookConfigBuilder().withWebhook(url).build(), options);
  }

  /**
   * Creates a client from environment variables.
   */
  static fromEnv(options?: WebhookClientOptions): WebhookClient {
    return WebhookClient.create(WebhookConfigBuilder.fromEnv().build(), options);
  }

  /**
   * Builds a message with the callback and sends it.
   *
   * ```typescript
   * await client.send((message) => message
   *   .content('Release 1.4.0 is out')
   *   .actionRow((row) => row.linkButton((button) => button.label('Notes').url(notesUrl))));
   * ```
   */
  async send(
    build: (message: MessageBuilder) => void,
    options?: SendOptions
  ): Promise<SentMessage | undefined> {
    const message = new MessageBuilder();
    build(message);
    return this.sendMessage(message, options);
  }

  /**
   * Validates and sends a prebuilt message.
   * @returns the created message when `wait` is set, otherwise undefined
   * @throws InvalidInputError if the message breaks a platform limit
   */
  async sendMessage(message: MessageBuilder, options: SendOptions = {}): Promise<SentMessage | undefined> {
    const result = validateMessage(message);
    if (!result.valid) {
      this.metrics.incrementCounter(MetricNames.MESSAGES_REJECTED, 1, { code: result.error.code });
      this.logger.warn('Message rejected before sending', {
        webhookId: this.webhookId,
        code: result.error.code,
        field: result.error.field,
        error: result.error.message,
      });
      throw new InvalidInputError(result.error);
    }

    const response = await this.transport.execute({
      method: 'POST',
      body: toWebhookPayload(message),
      query: { wait: options.wait ? true : undefined, thread_id: options.threadId },
      operation: 'webhook:execute',
    });

    this.metrics.incrementCounter(MetricNames.MESSAGES_SENT, 1);
    this.logger.info('Webhook executed', { webhookId: this.webhookId, wait: options.wait ?? false });

    if (!options.wait) {
      return undefined;
    }
    return parseResponse(SentMessageSchema, response.data, 'message');
  }

  /**
   * Fetches the webhook's description.
   */
  async getInfo(): Promise<WebhookInfo> {
    const response = await this.transport.execute({
      method: 'GET',
      operation: 'webhook:get',
    });
    return parseResponse(WebhookInfoSchema, response.data, 'webhook');
  }
}

/**
 * Checks a response body against its schema.
 */
function parseResponse<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  what: string
): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    throw new ResponseParseError(`unexpected ${what} body at ${path}: ${issue.message}`, {
      issueCount: parsed.error.issues.length,
    });
  }
  return parsed.data;
}
