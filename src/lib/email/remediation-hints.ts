/**
 * Remediation hints for failed relay attempts.
 *
 * Providers are matched by a substring of the relay host. New providers are
 * added to MAIL_PROVIDERS; the dispatcher only calls getRemediationHint.
 */

import type { DeliveryFailureKind } from './types';

export type MailProviderId = 'qq' | 'netease' | 'gmail' | 'outlook' | 'yahoo' | 'generic';

export interface MailProviderHint {
  id: MailProviderId;
  label: string;
  /** Lower-case substrings of the SMTP host that identify the provider */
  hostPatterns: readonly string[];
  hint: string;
}

export const MAIL_PROVIDERS: readonly MailProviderHint[] = [
  {
    id: 'qq',
    label: 'QQ Mail',
    hostPatterns: ['qq.com'],
    hint: 'QQ Mail requires the SMTP authorization code from Settings > Account, not the login password, and SMTP service must be enabled there.',
  },
  {
    id: 'netease',
    label: 'NetEase Mail',
    hostPatterns: ['163.com', '126.com', 'yeah.net'],
    hint: 'NetEase (163/126) mailboxes need the client authorization password and the SMTP service switched on under Settings > POP3/SMTP/IMAP.',
  },
  {
    id: 'gmail',
    label: 'Gmail',
    hostPatterns: ['gmail.com', 'googlemail.com'],
    hint: 'Gmail requires 2-Step Verification and an App Password; use smtp.gmail.com with port 465 (ssl) or 587 (starttls).',
  },
  {
    id: 'outlook',
    label: 'Outlook / Microsoft 365',
    hostPatterns: ['outlook', 'office365', 'hotmail', 'live.com'],
    hint: 'Outlook and Microsoft 365 accept smtp.office365.com:587 with starttls only; SMTP AUTH must be enabled for the mailbox.',
  },
  {
    id: 'yahoo',
    label: 'Yahoo Mail',
    hostPatterns: ['yahoo'],
    hint: 'Yahoo Mail requires an app password generated under Account Security.',
  },
];

export const GENERIC_PROVIDER: MailProviderHint = {
  id: 'generic',
  label: 'SMTP server',
  hostPatterns: [],
  hint: 'Check host, port, TLS mode and credentials with the mail administrator.',
};

export const FAILURE_KIND_HINTS: Record<DeliveryFailureKind, string> = {
  AUTH_FAILURE: 'Authentication was rejected; verify the user name and password.',
  RECIPIENT_REJECTED: 'The relay refused the recipients; check receiver_email and sending limits.',
  CONNECTION_DROPPED: 'The relay closed the connection; the TLS mode may not match the port.',
  CONNECT_FAILURE: 'No connection could be opened; check host, port and TLS mode.',
  PROTOCOL_ERROR: 'The relay answered with an SMTP error; inspect the response text.',
  NETWORK_ERROR: 'The network failed (DNS or timeout); check connectivity to the relay.',
  UNKNOWN: 'Unexpected failure; see the error message.',
};

export function resolveMailProvider(host: string): MailProviderHint {
  const normalized = host.toLowerCase();
  return (
    MAIL_PROVIDERS.find((provider) =>
      provider.hostPatterns.some((pattern) => normalized.includes(pattern))
    ) ?? GENERIC_PROVIDER
  );
}

/**
 * Failure-specific advice followed by provider-specific advice
 */
export function getRemediationHint(host: string, kind: DeliveryFailureKind): string {
  return `${FAILURE_KIND_HINTS[kind]} ${resolveMailProvider(host).hint}`;
}
