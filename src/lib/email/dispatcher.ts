/**
 * Delivery Dispatcher
 *
 * Delivers one message through an ordered list of relays:
 *
 *   IDLE → SELECT_RELAY → CONNECT → AUTHENTICATE → SEND → SUCCESS | FAILURE
 *
 * CONNECT covers the transport handshake including login; AUTHENTICATE
 * marks a verified session.
 *
 * A FAILURE goes back to SELECT_RELAY while relays remain, otherwise the
 * dispatch ends in ALL_FAILED; a SUCCESS ends it in DELIVERED. Relays are
 * tried one at a time in configured order, each at most once, without delay.
 */

import { ConfigError, DeliveryError, errorMessage } from '@/lib/errors';
import { emailLogger, type Logger } from '@/lib/logger';
import { classifyDeliveryFailure } from './failure-classifier';
import { createSmtpTransport, type RelayTransport, type TransportFactory } from './provider';
import { getRemediationHint } from './remediation-hints';
import type {
  ComposedMessage,
  DeliveryAttempt,
  DeliveryFailureReport,
  DeliveryResult,
  DeliveryStage,
  FailedDeliveryAttempt,
  OutgoingMessage,
  RelayConfig,
  RelaySendResult,
} from './types';

export const RELAY_CONNECTION_TIMEOUT_MS = 30_000;

export type DispatchState =
  | 'IDLE'
  | 'SELECT_RELAY'
  | 'CONNECT'
  | 'AUTHENTICATE'
  | 'SEND'
  | 'SUCCESS'
  | 'FAILURE'
  | 'DELIVERED'
  | 'ALL_FAILED';

const STAGE_STATES: Record<DeliveryStage, DispatchState> = {
  connect: 'CONNECT',
  authenticate: 'AUTHENTICATE',
  send: 'SEND',
};

export interface DeliveryDispatcherOptions {
  /** Primary first, then backups in preference order */
  relays: readonly RelayConfig[];
  recipients: readonly string[];
  transportFactory?: TransportFactory;
  connectionTimeoutMs?: number;
  logger?: Logger;
}

export class DeliveryDispatcher {
  private readonly relays: readonly RelayConfig[];
  private readonly recipients: readonly string[];
  private readonly transportFactory: TransportFactory;
  private readonly connectionTimeoutMs: number;
  private readonly logger: Logger;
  private state: DispatchState = 'IDLE';

  constructor(options: DeliveryDispatcherOptions) {
    const issues: string[] = [];
    if (options.relays.length === 0) issues.push('at least one relay must be configured');
    if (options.recipients.length === 0) issues.push('at least one recipient must be configured');
    if (issues.length > 0) {
      throw new ConfigError('Cannot dispatch mail', issues);
    }

    this.relays = [...options.relays];
    this.recipients = [...options.recipients];
    this.transportFactory = options.transportFactory ?? createSmtpTransport;
    this.connectionTimeoutMs = options.connectionTimeoutMs ?? RELAY_CONNECTION_TIMEOUT_MS;
    this.logger = options.logger ?? emailLogger.child({ component: 'dispatcher' });
  }

  get currentState(): DispatchState {
    return this.state;
  }

  /**
   * Deliver the message. Stops at the first relay that accepts it.
   */
  async dispatch(message: ComposedMessage): Promise<DeliveryResult> {
    const attempts: DeliveryAttempt[] = [];
    const outgoing: OutgoingMessage = { ...message, from: '', to: [...this.recipients] };

    this.logger.info(
      { relays: this.relays.map((relay) => relay.name), recipients: this.recipients.length },
      'Dispatching message'
    );

    for (const relay of this.relays) {
      this.transition('SELECT_RELAY', relay);

      const attempt = await this.attempt(relay, outgoing);
      attempts.push(attempt);

      if (attempt.outcome === 'success') {
        this.transition('DELIVERED', relay);
        this.logger.info(
          { relay: relay.name, messageId: attempt.messageId, recipients: outgoing.to },
          'Message delivered'
        );
        return { success: true, attempts };
      }
    }

    this.transition('ALL_FAILED');
    const report = buildFailureReport(attempts);
    this.logger.error({ hints: report.hints }, report.summary);

    return { success: false, attempts, report };
  }

  private async attempt(relay: RelayConfig, message: OutgoingMessage): Promise<DeliveryAttempt> {
    let transport: RelayTransport | null = null;

    try {
      transport = await this.runStage('connect', relay, () =>
        this.transportFactory(relay, { connectionTimeoutMs: this.connectionTimeoutMs })
      );

      const connected = transport;
      await this.handshake(relay, connected);

      // Providers reject a From that differs from the authenticated account,
      // so the bare relay address replaces any configured display name.
      message.from = relay.user;
      if (relay.senderName) {
        this.logger.warn(
          { relay: relay.name, senderName: relay.senderName, from: relay.user },
          'Configured sender name is not used in the From header'
        );
      }

      const result: RelaySendResult = await this.runStage('send', relay, () =>
        connected.send(message)
      );

      if (result.rejected.length > 0) {
        this.logger.warn(
          { relay: relay.name, rejected: result.rejected },
          'Relay rejected some recipients'
        );
      }

      this.transition('SUCCESS', relay);
      return {
        relay: relay.name,
        host: relay.host,
        outcome: 'success',
        messageId: result.messageId,
      };
    } catch (error) {
      const failure =
        error instanceof DeliveryError ? error : this.toDeliveryError(error, 'send', relay);

      this.transition('FAILURE', relay);
      this.logger.error(
        { relay: relay.name, host: relay.host, failure: failure.kind, stage: failure.stage, hint: failure.hint },
        failure.message
      );

      return {
        relay: relay.name,
        host: relay.host,
        outcome: 'failure',
        failure: failure.kind,
        hint: failure.hint,
        error: failure.message,
      };
    } finally {
      if (transport) {
        this.closeTransport(transport, relay);
      }
    }
  }

  private async runStage<T>(
    stage: DeliveryStage,
    relay: RelayConfig,
    task: () => T | Promise<T>
  ): Promise<T> {
    this.transition(STAGE_STATES[stage], relay);
    try {
      return await task();
    } catch (error) {
      throw this.toDeliveryError(error, stage, relay);
    }
  }

  /**
   * nodemailer's verify() connects and logs in within one call, so the
   * CONNECT state spans the whole handshake. A login failure is
   * reported at the authenticate stage, anything else at connect.
   * AUTHENTICATE is entered once the relay has accepted the credentials.
   */
  private async handshake(relay: RelayConfig, transport: RelayTransport): Promise<void> {
    try {
      await transport.verify();
    } catch (error) {
      const stage: DeliveryStage =
        classifyDeliveryFailure(error, 'connect') === 'AUTH_FAILURE' ? 'authenticate' : 'connect';
      throw this.toDeliveryError(error, stage, relay);
    }
    this.transition('AUTHENTICATE', relay);
  }

  private toDeliveryError(error: unknown, stage: DeliveryStage, relay: RelayConfig): DeliveryError {
    const kind = classifyDeliveryFailure(error, stage);
    return new DeliveryError(
      `Relay ${relay.name} (${relay.host}:${relay.port}) failed during ${stage}: ${errorMessage(error)}`,
      kind,
      stage,
      getRemediationHint(relay.host, kind),
      { cause: error }
    );
  }

  private closeTransport(transport: RelayTransport, relay: RelayConfig): void {
    try {
      transport.close();
    } catch (error) {
      this.logger.warn({ relay: relay.name, err: errorMessage(error) }, 'Failed to close transport');
    }
  }

  private transition(next: DispatchState, relay?: RelayConfig): void {
    this.logger.debug({ from: this.state, to: next, relay: relay?.name }, 'Dispatch state change');
    this.state = next;
  }
}

/**
 * One hint per failed relay plus the full attempt log
 */
export function buildFailureReport(attempts: readonly DeliveryAttempt[]): DeliveryFailureReport {
  const failed = attempts.filter(
    (attempt): attempt is FailedDeliveryAttempt => attempt.outcome === 'failure'
  );

  return {
    summary: `All ${failed.length} relay(s) failed: ${failed
      .map((attempt) => `${attempt.relay} (${attempt.failure})`)
      .join(', ')}`,
    hints: failed.map((attempt) => ({
      relay: attempt.relay,
      failure: attempt.failure,
      hint: attempt.hint,
    })),
    attempts: failed,
  };
}
