import type { DocumentRecord } from "@/lib/documents/types";
import { reminderLogger, type Logger } from "@/lib/logger";
import type { ReminderSummary } from "./reminder-types";

/**
 * Display bucket for a days-left value: "7天", "0天", "已过期3天"
 */
export function daysLeftBucket(daysLeft: number): string {
  return daysLeft >= 0 ? `${daysLeft}天` : `已过期${Math.abs(daysLeft)}天`;
}

function appendToGroup(
  groups: Map<string, DocumentRecord[]>,
  key: string,
  doc: DocumentRecord
): void {
  const group = groups.get(key);
  if (group) {
    group.push(doc);
  } else {
    groups.set(key, [doc]);
  }
}

/**
 * Aggregate reminder candidates by days-left bucket, person and document type
 */
export function buildReminderSummary(
  candidates: readonly DocumentRecord[],
  logger: Logger = reminderLogger
): ReminderSummary {
  const summary: ReminderSummary = {
    totalCount: candidates.length,
    expiredCount: 0,
    expiringCount: 0,
    byDaysLeft: new Map(),
    byPerson: new Map(),
    byDocumentType: new Map(),
  };

  for (const doc of candidates) {
    if (doc.daysLeft !== null) {
      if (doc.daysLeft < 0) {
        summary.expiredCount++;
      } else {
        summary.expiringCount++;
      }
      appendToGroup(summary.byDaysLeft, daysLeftBucket(doc.daysLeft), doc);
    }

    appendToGroup(summary.byPerson, doc.personName, doc);
    appendToGroup(summary.byDocumentType, doc.documentType, doc);
  }

  if (summary.totalCount > 0) {
    logger.info(
      {
        total: summary.totalCount,
        expired: summary.expiredCount,
        expiring: summary.expiringCount,
      },
      "Reminder summary built"
    );
  }

  return summary;
}
