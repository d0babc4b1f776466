/**
 * Document Roster - Type Definitions
 */

// =============================================================================
// Status
// =============================================================================

export type DocumentStatus = "EXPIRED" | "EXPIRING_SOON" | "VALID" | "UNKNOWN";

/**
 * Labels used in reports, logs and mail content
 */
export const DOCUMENT_STATUS_LABELS: Record<DocumentStatus, string> = {
  EXPIRED: "已过期",
  EXPIRING_SOON: "即将过期",
  VALID: "有效",
  UNKNOWN: "未知",
};

/**
 * Remark that marks a document as already handled. Compared after trimming.
 */
export const HANDLED_REMARK = "已办理";

// =============================================================================
// Records
// =============================================================================

/**
 * One personal document of the roster.
 *
 * `daysLeft`, `status` and `needsReminder` are null until the status engine
 * and the reminder filter have run over the batch.
 */
export interface DocumentRecord {
  personName: string;
  documentType: string;
  startDate: Date | null;
  expiryDate: Date | null;
  remarks: string;

  daysLeft: number | null;
  status: DocumentStatus | null;
  needsReminder: boolean | null;
}

export interface DocumentInput {
  personName: string;
  documentType: string;
  startDate?: Date | null;
  expiryDate?: Date | null;
  remarks?: string;
}

export function createDocumentRecord(input: DocumentInput): DocumentRecord {
  return {
    personName: input.personName,
    documentType: input.documentType,
    startDate: input.startDate ?? null,
    expiryDate: input.expiryDate ?? null,
    remarks: input.remarks ?? "",
    daysLeft: null,
    status: null,
    needsReminder: null,
  };
}
