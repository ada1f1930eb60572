/**
 * HTTP transport for the webhook API.
 */

import { WebhookConfig } from '../config/index.js';
import {
  ApiErrorResponseSchema,
  NetworkError,
  ResponseParseError,
  parseApiError,
} from '../errors/index.js';
import { Logger, MetricNames, MetricsCollector } from '../observability/index.js';

/**
 * Webhook API request parameters.
 */
export interface WebhookRequest {
  /** HTTP method */
  method: 'GET' | 'POST';
  /** Request body, serialized as JSON */
  body?: unknown;
  /** Operation name for logging/metrics */
  operation: string;
  /** Query parameters */
  query?: Record<string, string | boolean | undefined>;
}

/**
 * Webhook API response.
 */
export interface WebhookResponse {
  /** Parsed JSON body, or undefined for an empty body */
  data: unknown;
  /** HTTP status code */
  status: number;
}

/**
 * Sends requests to a single webhook URL with `fetch`.
 */
export class WebhookTransport {
  private readonly config: WebhookConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(options: { config: WebhookConfig; logger: Logger; metrics: MetricsCollector }) {
    this.config = options.config;
    this.logger = options.logger;
    this.metrics = options.metrics;
  }

  /**
   * Executes a webhook API request.
   * @throws WebhookError subclasses for HTTP, network and parse failures
   */
  async execute(request: WebhookRequest): Promise<WebhookResponse> {
    const startTime = Date.now();
    const labels = { operation: request.operation };

    this.logger.debug('Executing webhook request', {
      operation: request.operation,
      method: request.method,
    });
    this.metrics.incrementCounter(MetricNames.REQUESTS_TOTAL, 1, labels);

    try {
      const response = await this.executeRequest(request);
      const durationMs = Date.now() - startTime;

      this.metrics.incrementCounter(MetricNames.REQUESTS_SUCCESS, 1, labels);
      this.metrics.recordHistogram(MetricNames.REQUEST_LATENCY, durationMs / 1000, labels);
      this.logger.debug('Webhook request completed', {
        operation: request.operation,
        status: response.status,
        durationMs,
      });

      return response;
    } catch (error) {
      const durationMs = Date.now() - startTime;
      this.metrics.incrementCounter(MetricNames.REQUESTS_FAILED, 1, labels);
      this.metrics.recordHistogram(MetricNames.REQUEST_LATENCY, durationMs / 1000, labels);

      this.logger.error('Webhook request failed', {
        operation: request.operation,
        error: error instanceof Error ? error.message : String(error),
        durationMs,
      });

      throw error;
    }
  }

  private async executeRequest(request: WebhookRequest): Promise<WebhookResponse> {
    const init: RequestInit = {
      method: request.method,
      headers: this.buildHeaders(request.body !== undefined),
      signal: AbortSignal.timeout(this.config.requestTimeoutMs),
    };
    if (request.body !== undefined) {
      init.body = JSON.stringify(request.body);
    }

    let response: Response;
    try {
      response = await fetch(this.buildUrl(request.query), init);
    } catch (error) {
      if (error instanceof Error) {
        if (error.name === 'AbortError' || error.name === 'TimeoutError') {
          throw new NetworkError('Request timeout', error);
        }
        throw new NetworkError(error.message, error);
      }
      throw new NetworkError('Unknown network error');
    }

    if (!response.ok) {
      // The status decides the error class; an unreadable body only loses detail.
      const body = await this.readBody(response).catch(() => undefined);
      const parsed = ApiErrorResponseSchema.safeParse(body);
      throw parseApiError(
        response.status,
        parsed.success ? parsed.data : null,
        response.headers.get('Retry-After') ?? undefined
      );
    }

    return { data: await this.readBody(response), status: response.status };
  }

  private async readBody(response: Response): Promise<unknown> {
    if (response.status === 204) {
      return undefined;
    }

    const text = await response.text();
    if (text.length === 0) {
      return undefined;
    }

    const contentType = response.headers.get('content-type');
    if (!contentType?.includes('application/json')) {
      return text;
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ResponseParseError(
        error instanceof Error ? error.message : 'invalid JSON',
        { status: response.status }
      );
    }
  }

  private buildUrl(query?: Record<string, string | boolean | undefined>): string {
    const url = new URL(this.config.webhookUrl);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private buildHeaders(hasBody: boolean): Headers {
    const headers = new Headers({ 'User-Agent': this.config.userAgent });
    if (hasBody) {
      headers.set('Content-Type', 'application/json');
    }
    return headers;
  }
}
