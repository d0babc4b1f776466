/**
 * Reminder System - Central Export Module
 *
 * Turns classified document records into reminder candidates.
 *
 * @example
 * ```typescript
 * import { StatusEngine, ReminderFilter, buildReminderSummary } from '@/lib/reminders';
 * import { getToday } from '@/lib/dates/date-resolver';
 *
 * const today = getToday();
 * new StatusEngine({ expiringSoonThreshold: 30 }).compute(documents, today);
 * const candidates = new ReminderFilter({ thresholds: [60, 30, 7, 1] }).apply(documents);
 * const summary = buildReminderSummary(candidates);
 * ```
 */

export { StatusEngine, countStatusDistribution } from "./status-engine";
export {
  ReminderFilter,
  needsReminder,
  isHandled,
  sortReminderCandidates,
  MISSING_DAYS_LEFT_SORT_KEY,
} from "./reminder-filter";
export { buildReminderSummary, daysLeftBucket } from "./summary-builder";
export { buildStatusReport, toStatusReportRow } from "./status-report";

export { DEFAULT_REMINDER_DAYS, DEFAULT_EXPIRING_SOON_THRESHOLD } from "./reminder-types";

export type {
  ReminderSummary,
  StatusReportRow,
  StatusEngineOptions,
  ReminderFilterOptions,
} from "./reminder-types";
