/**
 * CSV Export Utility
 *
 * Writes the document roster and the status report with proper escaping and
 * a UTF-8 BOM for Excel compatibility.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { addDays, subDays } from "date-fns";
import { formatDate } from "@/lib/dates/date-resolver";
import { documentLogger, type Logger } from "@/lib/logger";
import type { StatusReportRow } from "@/lib/reminders/reminder-types";

/**
 * UTF-8 BOM (Byte Order Mark)
 * Required for Excel to correctly interpret UTF-8 encoded CSV files
 */
export const UTF8_BOM = "\uFEFF";

const DELIMITER = ",";
const LINE_BREAK = "\r\n";

/**
 * Characters that could trigger formula execution in spreadsheet applications
 */
const FORMULA_CHARS = ["=", "+", "-", "@", "\t", "\r"];

const BASE_COLUMNS = ["person_name", "document_type", "start_date", "expiry_date", "remarks"] as const;
const COMPUTED_COLUMNS = ["days_left", "status", "needs_reminder"] as const;

/**
 * Escape a CSV field value
 *
 * Free text starting with a formula character is prefixed with a single
 * quote. Values holding quotes, the delimiter or line breaks are then quoted.
 */
export function escapeField(raw: string, freeText = false): string {
  const value = freeText && FORMULA_CHARS.some((c) => raw.startsWith(c)) ? "'" + raw : raw;

  const needsEscaping =
    value.includes('"') ||
    value.includes(DELIMITER) ||
    value.includes("\n") ||
    value.includes("\r");

  if (needsEscaping) {
    return '"' + value.replace(/"/g, '""') + '"';
  }

  return value;
}

function rowFields(row: StatusReportRow, includeComputed: boolean): string[] {
  const fields = [
    escapeField(row.personName, true),
    escapeField(row.documentType, true),
    escapeField(row.startDate),
    escapeField(row.expiryDate),
    escapeField(row.remarks, true),
  ];

  if (includeComputed) {
    fields.push(escapeField(String(row.daysLeft)), escapeField(row.status), escapeField(row.needsReminder));
  }

  return fields;
}

/**
 * Render report rows as CSV text, BOM included
 */
export function generateDocumentsCsv(
  rows: readonly StatusReportRow[],
  includeComputed = true
): string {
  const header = includeComputed ? [...BASE_COLUMNS, ...COMPUTED_COLUMNS] : [...BASE_COLUMNS];
  const lines = [
    header.join(DELIMITER),
    ...rows.map((row) => rowFields(row, includeComputed).join(DELIMITER)),
  ];

  return UTF8_BOM + lines.join(LINE_BREAK) + LINE_BREAK;
}

/**
 * Write report rows to a file, creating the output directory first
 */
export async function writeDocumentsCsv(
  path: string,
  rows: readonly StatusReportRow[],
  includeComputed = true,
  logger: Logger = documentLogger
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, generateDocumentsCsv(rows, includeComputed), "utf-8");
  logger.info({ path, count: rows.length }, "CSV file written");
}

// =============================================================================
// Sample data
// =============================================================================

interface SampleRow {
  personName: string;
  documentType: string;
  issuedDaysAgo: number;
  expiresInDays: number;
  remarks: string;
}

const SAMPLE_ROWS: readonly SampleRow[] = [
  { personName: "张三", documentType: "身份证", issuedDaysAgo: 3650, expiresInDays: 365, remarks: "研发部" },
  { personName: "李四", documentType: "护照", issuedDaysAgo: 1825, expiresInDays: 30, remarks: "市场部" },
  { personName: "王五", documentType: "驾驶证", issuedDaysAgo: 2190, expiresInDays: 7, remarks: "行政部" },
  { personName: "赵六", documentType: "工作许可证", issuedDaysAgo: 365, expiresInDays: -5, remarks: "技术部" },
  { personName: "钱七", documentType: "健康证", issuedDaysAgo: 300, expiresInDays: 60, remarks: "食堂" },
];

/**
 * Sample roster rows dated relative to `today`
 */
export function buildSampleRows(today: Date): StatusReportRow[] {
  return SAMPLE_ROWS.map((sample) => ({
    personName: sample.personName,
    documentType: sample.documentType,
    startDate: formatDate(subDays(today, sample.issuedDaysAgo)),
    expiryDate: formatDate(addDays(today, sample.expiresInDays)),
    daysLeft: "",
    status: "",
    remarks: sample.remarks,
    needsReminder: "",
  }));
}

/**
 * Write a five-row sample roster
 */
export async function createSampleCsv(
  path: string,
  today: Date,
  logger: Logger = documentLogger
): Promise<void> {
  await writeDocumentsCsv(path, buildSampleRows(today), false, logger);
}
