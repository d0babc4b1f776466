/**
 * Relay Transport Abstraction
 *
 * One transport per relay attempt. The dispatcher only talks to the
 * RelayTransport interface; the SMTP implementation uses Nodemailer.
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import type { OutgoingMessage, RelayConfig, RelaySendResult, TlsMode } from './types';

// =============================================================================
// Transport Interface
// =============================================================================

export interface RelayTransport {
  /**
   * Connect and authenticate. Rejects when either step fails.
   */
  verify(): Promise<void>;

  /**
   * Submit one message to all of its recipients
   */
  send(message: OutgoingMessage): Promise<RelaySendResult>;

  /**
   * Release the connection. Safe to call after a failure.
   */
  close(): void;
}

export interface TransportOptions {
  connectionTimeoutMs: number;
}

export type TransportFactory = (relay: RelayConfig, options: TransportOptions) => RelayTransport;

// =============================================================================
// SMTP Transport
// =============================================================================

/**
 * Nodemailer connection flags per TLS mode
 */
export function tlsOptions(
  mode: TlsMode
): Pick<SMTPTransport.Options, 'secure' | 'requireTLS' | 'ignoreTLS'> {
  switch (mode) {
    case 'ssl':
      return { secure: true };
    case 'starttls':
      return { secure: false, requireTLS: true };
    case 'plain':
      return { secure: false, ignoreTLS: true };
  }
}

function addressOf(entry: string | { address: string }): string {
  return typeof entry === 'string' ? entry : entry.address;
}

/**
 * SMTP relay transport using Nodemailer
 */
export class SmtpRelayTransport implements RelayTransport {
  private transporter: Transporter<SMTPTransport.SentMessageInfo>;

  constructor(relay: RelayConfig, options: TransportOptions) {
    this.transporter = nodemailer.createTransport({
      host: relay.host,
      port: relay.port,
      ...tlsOptions(relay.tlsMode),
      auth: {
        user: relay.user,
        pass: relay.password,
      },
      // Timeouts
      connectionTimeout: options.connectionTimeoutMs,
      greetingTimeout: options.connectionTimeoutMs,
      socketTimeout: options.connectionTimeoutMs,
    });
  }

  async verify(): Promise<void> {
    await this.transporter.verify();
  }

  async send(message: OutgoingMessage): Promise<RelaySendResult> {
    const info = await this.transporter.sendMail({
      from: message.from,
      to: message.to.join(', '),
      subject: message.subject,
      html: message.html,
      text: message.text,
    });

    return {
      messageId: info.messageId,
      accepted: info.accepted.map(addressOf),
      rejected: info.rejected.map(addressOf),
    };
  }

  close(): void {
    this.transporter.close();
  }
}

export const createSmtpTransport: TransportFactory = (relay, options) =>
  new SmtpRelayTransport(relay, options);
