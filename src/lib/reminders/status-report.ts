import { formatDate } from "@/lib/dates/date-resolver";
import { DOCUMENT_STATUS_LABELS, type DocumentRecord } from "@/lib/documents/types";
import type { StatusReportRow } from "./reminder-types";

const STATUS_PRIORITY: Record<string, number> = {
  [DOCUMENT_STATUS_LABELS.EXPIRED]: 0,
  [DOCUMENT_STATUS_LABELS.EXPIRING_SOON]: 1,
};
const OTHER_STATUS_PRIORITY = 2;
const MISSING_DAYS_LEFT_REPORT_KEY = 999;

function statusPriority(row: StatusReportRow): number {
  return STATUS_PRIORITY[row.status] ?? OTHER_STATUS_PRIORITY;
}

function daysLeftKey(row: StatusReportRow): number {
  return row.daysLeft === "" ? MISSING_DAYS_LEFT_REPORT_KEY : row.daysLeft;
}

export function toStatusReportRow(doc: DocumentRecord): StatusReportRow {
  return {
    personName: doc.personName,
    documentType: doc.documentType,
    startDate: doc.startDate ? formatDate(doc.startDate) : "",
    expiryDate: doc.expiryDate ? formatDate(doc.expiryDate) : "",
    daysLeft: doc.daysLeft ?? "",
    status: doc.status ? DOCUMENT_STATUS_LABELS[doc.status] : "",
    remarks: doc.remarks,
    needsReminder: doc.needsReminder === null ? "" : doc.needsReminder ? "是" : "否",
  };
}

/**
 * Report rows ordered expired first, then expiring soon, then everything
 * else; ascending daysLeft within a status.
 */
export function buildStatusReport(documents: readonly DocumentRecord[]): StatusReportRow[] {
  return documents
    .map(toStatusReportRow)
    .sort((a, b) => statusPriority(a) - statusPriority(b) || daysLeftKey(a) - daysLeftKey(b));
}
