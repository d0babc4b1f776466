/**
 * Maps errors raised by nodemailer's SMTP transport onto DeliveryFailureKind.
 *
 * Nodemailer errors carry `code` (EAUTH, EENVELOPE, ECONNECTION, ...),
 * `responseCode` (the SMTP reply code) and `command` (the SMTP command that
 * failed). Socket errors from Node carry the errno `code` (ECONNRESET, ...).
 */

import type { DeliveryFailureKind, DeliveryStage } from './types';

interface SmtpErrorDetails {
  message: string;
  code?: string;
  responseCode?: number;
  command?: string;
}

const AUTH_CODES = new Set(['EAUTH', 'ENOAUTH']);
const AUTH_RESPONSE_CODES = new Set([534, 535]);
const RECIPIENT_RESPONSE_CODES = new Set([550, 551, 552, 553]);
const DROPPED_CODES = new Set(['ECONNRESET', 'EPIPE']);
const NETWORK_CODES = new Set([
  'EDNS',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
]);
const CONNECTION_CODES = new Set(['ECONNECTION', 'ECONNREFUSED', 'ESOCKET', 'ETLS']);
const PROTOCOL_CODES = new Set(['EPROTOCOL', 'EMESSAGE', 'EENVELOPE']);

function readDetails(error: unknown): SmtpErrorDetails {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  const details: SmtpErrorDetails = { message: error.message };
  if ('code' in error && typeof error.code === 'string') {
    details.code = error.code;
  }
  if ('responseCode' in error && typeof error.responseCode === 'number') {
    details.responseCode = error.responseCode;
  }
  if ('command' in error && typeof error.command === 'string') {
    details.command = error.command;
  }
  return details;
}

function isRecipientCommand(command: string | undefined): boolean {
  return command !== undefined && command.toUpperCase().startsWith('RCPT');
}

/**
 * Classify a failure raised at the given stage of a relay attempt
 */
export function classifyDeliveryFailure(error: unknown, stage: DeliveryStage): DeliveryFailureKind {
  const { message, code, responseCode, command } = readDetails(error);

  if ((code && AUTH_CODES.has(code)) || (responseCode && AUTH_RESPONSE_CODES.has(responseCode))) {
    return 'AUTH_FAILURE';
  }

  if (
    (code === 'EENVELOPE' && /recipient/i.test(message)) ||
    (isRecipientCommand(command) && responseCode !== undefined && RECIPIENT_RESPONSE_CODES.has(responseCode))
  ) {
    return 'RECIPIENT_REJECTED';
  }

  if ((code && DROPPED_CODES.has(code)) || /closed unexpectedly/i.test(message)) {
    return 'CONNECTION_DROPPED';
  }

  if (code && NETWORK_CODES.has(code)) {
    return 'NETWORK_ERROR';
  }

  if (code && CONNECTION_CODES.has(code)) {
    return stage === 'send' ? 'CONNECTION_DROPPED' : 'CONNECT_FAILURE';
  }

  if ((code && PROTOCOL_CODES.has(code)) || responseCode !== undefined) {
    return 'PROTOCOL_ERROR';
  }

  return 'UNKNOWN';
}
