/**
 * Email System Types
 *
 * Type definitions for relay configuration, outgoing messages and the
 * delivery attempt log.
 */

/**
 * How the connection to a relay is secured
 * - ssl: implicit TLS from the first byte (usually port 465)
 * - starttls: plaintext connection upgraded via STARTTLS (usually 587)
 * - plain: no TLS at all
 */
export type TlsMode = 'ssl' | 'starttls' | 'plain';

/**
 * One outbound mail-submission endpoint. Its position in the relay list is
 * its preference order; index 0 is the primary.
 */
export interface RelayConfig {
  name: string;
  host: string;
  port: number;
  user: string;
  password: string;
  /** Configured display name. Not used in the From header, see dispatcher. */
  senderName: string;
  tlsMode: TlsMode;
}

/**
 * Failure classification of a single relay attempt
 */
export type DeliveryFailureKind =
  | 'AUTH_FAILURE'
  | 'RECIPIENT_REJECTED'
  | 'CONNECTION_DROPPED'
  | 'CONNECT_FAILURE'
  | 'PROTOCOL_ERROR'
  | 'NETWORK_ERROR'
  | 'UNKNOWN';

/**
 * Stage of a relay attempt at which an error surfaced
 */
export type DeliveryStage = 'connect' | 'authenticate' | 'send';

/**
 * Rendered message without sender or recipients
 */
export interface ComposedMessage {
  subject: string;
  html: string;
  text?: string;
}

/**
 * Message handed to a relay transport. `from` is rewritten per attempt.
 */
export interface OutgoingMessage extends ComposedMessage {
  from: string;
  to: string[];
}

/**
 * What a transport reports back after a submission was accepted
 */
export interface RelaySendResult {
  messageId?: string;
  accepted: string[];
  rejected: string[];
}

export type DeliveryAttempt =
  | {
      relay: string;
      host: string;
      outcome: 'success';
      messageId?: string;
    }
  | {
      relay: string;
      host: string;
      outcome: 'failure';
      failure: DeliveryFailureKind;
      hint: string;
      error: string;
    };

export type FailedDeliveryAttempt = Extract<DeliveryAttempt, { outcome: 'failure' }>;

/**
 * Aggregated report produced when every relay failed
 */
export interface DeliveryFailureReport {
  summary: string;
  hints: Array<{ relay: string; failure: DeliveryFailureKind; hint: string }>;
  attempts: FailedDeliveryAttempt[];
}

/**
 * Overall dispatch outcome
 */
export interface DeliveryResult {
  success: boolean;
  attempts: DeliveryAttempt[];
  report?: DeliveryFailureReport;
}

/**
 * Templates the composer compiles
 */
export type TemplateName = 'subject' | 'body' | 'row' | 'test-message';

/**
 * Raw template strings as configured
 */
export interface ReminderTemplates {
  subject: string;
  bodyHtml: string;
  tableRowHtml: string;
}
