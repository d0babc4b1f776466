/**
 * Status Engine
 *
 * Assigns `daysLeft` and a status to every document of a batch. The batch is
 * measured against a single "today" supplied by the caller.
 */

import { calculateDaysLeft } from "@/lib/dates/date-resolver";
import {
  DOCUMENT_STATUS_LABELS,
  type DocumentRecord,
  type DocumentStatus,
} from "@/lib/documents/types";
import { ConfigError } from "@/lib/errors";
import { reminderLogger, type Logger } from "@/lib/logger";
import type { StatusEngineOptions } from "./reminder-types";

export class StatusEngine {
  private readonly threshold: number;
  private readonly logger: Logger;

  constructor(options: StatusEngineOptions) {
    if (!Number.isInteger(options.expiringSoonThreshold) || options.expiringSoonThreshold < 0) {
      throw new ConfigError("Invalid expiring-soon threshold", [
        `days_until_expiring_threshold must be a non-negative integer, got ${options.expiringSoonThreshold}`,
      ]);
    }

    this.threshold = options.expiringSoonThreshold;
    this.logger = options.logger ?? reminderLogger.child({ component: "status-engine" });
  }

  /**
   * Classify a days-left value against the expiring-soon threshold
   */
  classify(daysLeft: number): DocumentStatus {
    if (daysLeft < 0) return "EXPIRED";
    if (daysLeft <= this.threshold) return "EXPIRING_SOON";
    return "VALID";
  }

  /**
   * Populate `daysLeft` and `status` in place. Returns the same array.
   */
  compute(documents: DocumentRecord[], today: Date): DocumentRecord[] {
    this.logger.info(
      { count: documents.length, threshold: this.threshold },
      "Computing document status"
    );

    for (const doc of documents) {
      if (doc.expiryDate) {
        doc.daysLeft = calculateDaysLeft(doc.expiryDate, today);
        doc.status = this.classify(doc.daysLeft);
      } else {
        doc.daysLeft = null;
        doc.status = "UNKNOWN";
        doc.needsReminder = false;
      }
    }

    this.logger.info(
      { distribution: countStatusDistribution(documents) },
      "Status distribution"
    );

    return documents;
  }
}

/**
 * Count documents per status label. Unclassified documents count as unknown.
 */
export function countStatusDistribution(
  documents: readonly DocumentRecord[]
): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const doc of documents) {
    const label = DOCUMENT_STATUS_LABELS[doc.status ?? "UNKNOWN"];
    counts[label] = (counts[label] ?? 0) + 1;
  }
  return counts;
}
