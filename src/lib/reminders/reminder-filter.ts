/**
 * Reminder Filter
 *
 * Decides which classified documents need a reminder and orders the
 * candidates for the notification.
 */

import { HANDLED_REMARK, type DocumentRecord } from "@/lib/documents/types";
import { ConfigError } from "@/lib/errors";
import { reminderLogger, type Logger } from "@/lib/logger";
import type { ReminderFilterOptions } from "./reminder-types";

/**
 * Sort key for candidates without a daysLeft value. Places them ahead of
 * every expired document with a smaller overdue count.
 */
export const MISSING_DAYS_LEFT_SORT_KEY = -999;

export function isHandled(doc: DocumentRecord): boolean {
  return doc.remarks.trim() === HANDLED_REMARK;
}

/**
 * Eligibility rule for a single classified document
 */
export function needsReminder(doc: DocumentRecord, thresholds: readonly number[]): boolean {
  if (doc.status === "UNKNOWN" || doc.daysLeft === null) return false;
  if (isHandled(doc)) return false;
  if (doc.status === "EXPIRED") return true;
  if (thresholds.length === 0) return false;

  return doc.daysLeft <= Math.max(...thresholds);
}

/**
 * Ascending by daysLeft, stable for equal values
 */
export function sortReminderCandidates(documents: DocumentRecord[]): DocumentRecord[] {
  return documents.sort(
    (a, b) =>
      (a.daysLeft ?? MISSING_DAYS_LEFT_SORT_KEY) - (b.daysLeft ?? MISSING_DAYS_LEFT_SORT_KEY)
  );
}

export class ReminderFilter {
  private readonly thresholds: readonly number[];
  private readonly logger: Logger;

  constructor(options: ReminderFilterOptions) {
    const invalid = options.thresholds.filter((days) => !Number.isInteger(days) || days < 0);
    if (invalid.length > 0) {
      throw new ConfigError("Invalid reminder thresholds", [
        `days_before_expiry must contain non-negative integers, got ${invalid.join(", ")}`,
      ]);
    }

    this.thresholds = [...options.thresholds];
    this.logger = options.logger ?? reminderLogger.child({ component: "reminder-filter" });
  }

  /**
   * Set `needsReminder` on every document and return the sorted candidates
   */
  apply(documents: DocumentRecord[]): DocumentRecord[] {
    this.logger.info({ thresholds: this.thresholds }, "Filtering reminder candidates");

    const candidates: DocumentRecord[] = [];

    for (const doc of documents) {
      doc.needsReminder = needsReminder(doc, this.thresholds);

      if (!doc.needsReminder && doc.daysLeft !== null && isHandled(doc)) {
        this.logger.debug(
          { personName: doc.personName, documentType: doc.documentType },
          "Skipping handled document"
        );
      }

      if (doc.needsReminder) {
        candidates.push(doc);
      }
    }

    this.logger.info({ count: candidates.length }, `${candidates.length} documents need a reminder`);

    return sortReminderCandidates(candidates);
  }
}
