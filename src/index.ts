/**
 * Webhook Message Kit
 *
 * Builds webhook messages with a fluent API and checks them against the
 * platform's documented limits before they are sent.
 *
 * ## Features
 *
 * - Fluent builders for messages, embeds, action rows and buttons
 * - Pre-send validation with one typed error per rejected message
 * - Webhook execution with optional message return
 * - Webhook description lookup
 *
 * ## Quick Start
 *
 * ```typescript
 * import { WebhookClient, ButtonStyle } from 'webhook-message-kit';
 *
 * const client = WebhookClient.fromEnv();
 *
 * await client.send((message) => message
 *   .content('Nightly build failed')
 *   .embed((embed) => embed
 *     .title('build #812')
 *     .color(0xff0000)
 *     .addField('Stage', 'integration tests', true))
 *   .actionRow((row) => row
 *     .regularButton((button) => button.style(ButtonStyle.Danger).customId('rerun:812').label('Re-run'))
 *     .linkButton((button) => button.label('Logs').url('https://ci.example.com/812'))));
 * ```
 *
 * ## Validation Only
 *
 * ```typescript
 * const result = validateMessage(new MessageBuilder().content('hi'));
 * if (!result.valid) console.error(result.error.code, result.error.message);
 * ```
 *
 * @module webhook-message-kit
 */

// Client
export {
  WebhookClient,
  type WebhookClientOptions,
  type SendOptions,
} from './client/index.js';

// Builders
export {
  MessageBuilder,
  EmbedBuilder,
  ActionRowBuilder,
  LinkButtonBuilder,
  RegularButtonBuilder,
  type MessageDraft,
  type MediaSize,
  type ButtonBuilder,
  type ButtonDraftBase,
  type LinkButtonDraft,
  type RegularButtonDraft,
} from './builders/index.js';

// Validation
export {
  Interval,
  type Widen,
  type Constraint,
  constraint,
  Limits,
  MAX_MESSAGE_CONTENT_LENGTH,
  MAX_EMBEDS_PER_MESSAGE,
  MAX_EMBED_TOTAL_CHARACTERS,
  MAX_ACTION_ROWS,
  MAX_BUTTONS_PER_ROW,
  MAX_EMBED_FIELDS,
  MAX_BUTTON_LABEL_LENGTH,
  MAX_CUSTOM_ID_LENGTH,
  ValidationContext,
  type ValidationResult,
  checkMessage,
  checkEmbed,
  checkEmbedAuthor,
  checkEmbedFooter,
  checkEmbedField,
  checkActionRow,
  checkButton,
  validateMessage,
  assertValidMessage,
} from './validation/index.js';

// Serialization
export {
  toWebhookPayload,
  toActionRowPayload,
  toButtonPayload,
} from './serialization/index.js';

// Configuration
export {
  type WebhookConfig,
  WebhookConfigBuilder,
  SecretString,
  parseWebhookUrl,
  buildWebhookUrl,
  DEFAULT_USER_AGENT,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from './config/index.js';

// Types
export {
  type Snowflake,
  isValidSnowflake,
  type EmbedFooter,
  type EmbedMedia,
  type EmbedAuthor,
  type EmbedField,
  type Embed,
  type WebhookMessagePayload,
  getEmbedCharacterCount,
  characterLength,
  ComponentType,
  ButtonStyle,
  type NonLinkButtonStyle,
  type PartialEmoji,
  type LinkButton,
  type RegularButton,
  type Button,
  type ActionRow,
  WebhookType,
  SnowflakeSchema,
  UserSchema,
  WebhookInfoSchema,
  SentMessageSchema,
  type User,
  type WebhookInfo,
  type SentMessage,
} from './types/index.js';

// Errors
export {
  WebhookError,
  WebhookErrorCode,
  ApiErrorResponseSchema,
  type ApiErrorResponse,
  MessageValidationError,
  LengthExceededError,
  LimitExceededError,
  DuplicateIdentifierError,
  MissingRequiredFieldError,
  EmptyCompositeError,
  InvalidInputError,
  BadRequestError,
  UnauthorizedError,
  ForbiddenError,
  NotFoundError,
  RateLimitedError,
  ServerError,
  NetworkError,
  ResponseParseError,
  ConfigurationError,
  parseApiError,
  isWebhookError,
  isMessageValidationError,
  isRetryableError,
} from './errors/index.js';

// Transport
export {
  WebhookTransport,
  type WebhookRequest,
  type WebhookResponse,
} from './transport/index.js';

// Observability
export {
  LogLevel,
  type LogEntry,
  type Logger,
  parseLogLevel,
  redactSensitive,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  type MetricsCollector,
  MetricNames,
  NoopMetricsCollector,
  InMemoryMetricsCollector,
} from './observability/index.js';
