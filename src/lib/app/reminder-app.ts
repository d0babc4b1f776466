/**
 * Reminder Application
 *
 * Wires configuration, roster import, classification, composition and
 * delivery into the four runs the CLI offers. Each run reports success as a
 * boolean; failures are logged here and never escape.
 */

import { getToday } from "@/lib/dates/date-resolver";
import type { AppConfig } from "@/lib/config";
import { resolveDatedPath } from "@/lib/config";
import { readDocumentsCsv, validateDocuments } from "@/lib/documents/csv-reader";
import { createSampleCsv, writeDocumentsCsv } from "@/lib/documents/csv-writer";
import type { DocumentRecord } from "@/lib/documents/types";
import {
  DEFAULT_TEST_SUBJECT,
  DeliveryDispatcher,
  NotificationComposer,
  composeTestMessage,
  type ComposedMessage,
  type TransportFactory,
} from "@/lib/email";
import { logger as rootLogger, type Logger } from "@/lib/logger";
import {
  ReminderFilter,
  StatusEngine,
  buildReminderSummary,
  buildStatusReport,
  countStatusDistribution,
} from "@/lib/reminders";

export interface ReminderAppOptions {
  logger?: Logger;
  /** Replaces the SMTP transport; used by tests and dry runs */
  transportFactory?: TransportFactory;
  clock?: () => Date;
}

export class ReminderApp {
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly statusEngine: StatusEngine;
  private readonly reminderFilter: ReminderFilter;
  private readonly composer: NotificationComposer;
  private readonly dispatcher: DeliveryDispatcher;

  constructor(
    private readonly config: AppConfig,
    options: ReminderAppOptions = {}
  ) {
    this.logger = options.logger ?? rootLogger.child({ module: "app" });
    this.clock = options.clock ?? (() => new Date());

    this.statusEngine = new StatusEngine({
      expiringSoonThreshold: config.report.expiringSoonThreshold,
      logger: this.logger,
    });
    this.reminderFilter = new ReminderFilter({
      thresholds: config.reminder.daysBeforeExpiry,
      logger: this.logger,
    });
    this.composer = new NotificationComposer(config.templates, { logger: this.logger });
    this.dispatcher = new DeliveryDispatcher({
      relays: config.relays,
      recipients: config.recipients,
      transportFactory: options.transportFactory,
      logger: this.logger,
    });
  }

  // ===========================================================================
  // Pipeline
  // ===========================================================================

  async loadDocuments(): Promise<DocumentRecord[]> {
    const documents = await readDocumentsCsv(this.config.dataFile, this.logger);
    for (const warning of validateDocuments(documents)) {
      this.logger.warn({ path: this.config.dataFile }, warning);
    }
    return documents;
  }

  /**
   * Classify the batch in place and return the sorted reminder candidates
   */
  evaluate(documents: DocumentRecord[], today: Date): DocumentRecord[] {
    this.statusEngine.compute(documents, today);
    return this.reminderFilter.apply(documents);
  }

  // ===========================================================================
  // Runs
  // ===========================================================================

  /**
   * Send one reminder mail covering every candidate. Nothing is sent when no
   * document needs a reminder.
   */
  async runReminder(): Promise<boolean> {
    return this.guard("Reminder run", async () => {
      const today = getToday(this.clock());
      const documents = await this.loadDocuments();
      const candidates = this.evaluate(documents, today);

      if (candidates.length === 0) {
        this.logger.info("No documents need a reminder");
        return true;
      }

      const summary = buildReminderSummary(candidates, this.logger);
      this.logger.info(
        {
          total: summary.totalCount,
          expired: summary.expiredCount,
          expiring: summary.expiringCount,
        },
        "Reminder summary"
      );

      return this.deliver(this.composer.compose(candidates, today));
    });
  }

  /**
   * Write the status report of the whole roster. Returns the path written,
   * or null when the run failed.
   */
  async runReport(outputFile?: string): Promise<string | null> {
    let written: string | null = null;

    await this.guard("Report run", async () => {
      const today = getToday(this.clock());
      const documents = await this.loadDocuments();
      this.evaluate(documents, today);

      const path = outputFile ?? resolveDatedPath(this.config.report.outputFilename, today);
      await writeDocumentsCsv(path, buildStatusReport(documents), true, this.logger);

      this.logger.info(
        { path, distribution: countStatusDistribution(documents) },
        "Status report written"
      );
      written = path;
      return true;
    });

    return written;
  }

  async runTestEmail(): Promise<boolean> {
    return this.guard("Test mail", async () =>
      this.deliver(composeTestMessage(DEFAULT_TEST_SUBJECT, this.clock()))
    );
  }

  async createSampleData(): Promise<boolean> {
    return this.guard("Sample data", async () => {
      await createSampleCsv(this.config.dataFile, getToday(this.clock()), this.logger);
      return true;
    });
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async deliver(message: ComposedMessage): Promise<boolean> {
    const result = await this.dispatcher.dispatch(message);
    if (!result.success && result.report) {
      for (const { relay, failure, hint } of result.report.hints) {
        this.logger.warn({ relay, failure }, hint);
      }
    }
    return result.success;
  }

  private async guard(task: string, run: () => Promise<boolean>): Promise<boolean> {
    this.logger.info(`${task} started`);
    try {
      const success = await run();
      if (success) {
        this.logger.info(`${task} completed`);
      } else {
        this.logger.error(`${task} did not complete`);
      }
      return success;
    } catch (error) {
      this.logger.error({ err: error }, `${task} failed`);
      return false;
    }
  }
}
