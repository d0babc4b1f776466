/**
 * Reminder System - Type Definitions
 *
 * Types and defaults shared by the status engine, the reminder filter, the
 * summary builder and the status report.
 */

import type { DocumentRecord } from "@/lib/documents/types";
import type { Logger } from "@/lib/logger";

// =============================================================================
// Configuration
// =============================================================================

/**
 * Default reminder thresholds in days before expiry. Only the largest value
 * decides eligibility; the order is kept for reporting.
 */
export const DEFAULT_REMINDER_DAYS: readonly number[] = [60, 30, 7, 1];

/**
 * Documents expiring within this many days are classified EXPIRING_SOON
 */
export const DEFAULT_EXPIRING_SOON_THRESHOLD = 30;

export interface StatusEngineOptions {
  expiringSoonThreshold: number;
  logger?: Logger;
}

export interface ReminderFilterOptions {
  thresholds: readonly number[];
  logger?: Logger;
}

// =============================================================================
// Summary
// =============================================================================

/**
 * Aggregation over the reminder candidates of one run
 */
export interface ReminderSummary {
  totalCount: number;
  /** Candidates with daysLeft < 0 */
  expiredCount: number;
  /** Candidates with daysLeft >= 0 */
  expiringCount: number;
  /** Keyed by "N天" / "已过期N天", insertion order preserved */
  byDaysLeft: Map<string, DocumentRecord[]>;
  byPerson: Map<string, DocumentRecord[]>;
  byDocumentType: Map<string, DocumentRecord[]>;
}

// =============================================================================
// Status report
// =============================================================================

/**
 * One row of the tabular status report. Empty strings stand for absent values.
 */
export interface StatusReportRow {
  personName: string;
  documentType: string;
  startDate: string;
  expiryDate: string;
  daysLeft: number | "";
  status: string;
  remarks: string;
  /** "是" / "否", empty before the reminder filter has run */
  needsReminder: string;
}
