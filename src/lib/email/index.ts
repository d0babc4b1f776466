/**
 * Email System - Central Export Module
 *
 * Composes the reminder mail and delivers it through the configured relays.
 *
 * @example
 * ```typescript
 * import { NotificationComposer, DeliveryDispatcher } from '@/lib/email';
 *
 * const composer = new NotificationComposer(config.templates);
 * const dispatcher = new DeliveryDispatcher({
 *   relays: config.relays,
 *   recipients: config.recipients,
 * });
 *
 * const result = await dispatcher.dispatch(composer.compose(candidates, today));
 * if (!result.success) {
 *   console.error(result.report?.summary);
 * }
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export type {
  TlsMode,
  RelayConfig,
  DeliveryFailureKind,
  DeliveryStage,
  ComposedMessage,
  OutgoingMessage,
  RelaySendResult,
  DeliveryAttempt,
  FailedDeliveryAttempt,
  DeliveryFailureReport,
  DeliveryResult,
  TemplateName,
  ReminderTemplates,
} from './types';

// =============================================================================
// Composition
// =============================================================================

export {
  NotificationComposer,
  composeTestMessage,
  displayColor,
  formatDaysLeft,
  escapeHtml,
  DISPLAY_COLORS,
} from './composer';

export { compileTemplate, findMissingPlaceholders, type CompiledTemplate } from './renderer';

export {
  DEFAULT_SUBJECT_TEMPLATE,
  DEFAULT_BODY_TEMPLATE,
  DEFAULT_ROW_TEMPLATE,
  DEFAULT_TEST_SUBJECT,
} from './templates';

// =============================================================================
// Delivery
// =============================================================================

export {
  DeliveryDispatcher,
  buildFailureReport,
  RELAY_CONNECTION_TIMEOUT_MS,
  type DispatchState,
  type DeliveryDispatcherOptions,
} from './dispatcher';

export {
  type RelayTransport,
  type TransportFactory,
  type TransportOptions,
  SmtpRelayTransport,
  createSmtpTransport,
  tlsOptions,
} from './provider';

export { classifyDeliveryFailure } from './failure-classifier';

export {
  getRemediationHint,
  resolveMailProvider,
  MAIL_PROVIDERS,
  FAILURE_KIND_HINTS,
  type MailProviderId,
} from './remediation-hints';

export { parseRecipients, validateRecipients } from './recipients';
