/**
 * Document roster CSV import
 *
 * Reads the roster file (`person_name,document_type,expiry_date` plus the
 * optional `start_date` and `remarks` columns) into DocumentRecords. Line
 * numbers in errors count the header as line 1.
 */

import { readFile } from "node:fs/promises";
import { parse, CsvError } from "csv-parse/sync";
import { z } from "zod";
import { parseDate } from "@/lib/dates/date-resolver";
import { ConfigError, ValidationError, isNotFoundError } from "@/lib/errors";
import { documentLogger, type Logger } from "@/lib/logger";
import { createDocumentRecord, type DocumentRecord } from "./types";

export const REQUIRED_COLUMNS = ["person_name", "document_type", "expiry_date"] as const;

const csvRowsSchema = z.array(z.record(z.string()));

type CsvRow = z.infer<typeof csvRowsSchema>[number];

function parseRows(text: string, source: string): CsvRow[] {
  let raw: unknown;
  try {
    raw = parse(text, {
      bom: true,
      columns: (header: string[]) => header.map((column) => column.trim()),
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    if (error instanceof CsvError) {
      throw new ValidationError(`Malformed CSV in ${source}: ${error.message}`);
    }
    throw error;
  }

  const rows = csvRowsSchema.safeParse(raw);
  if (!rows.success) {
    throw new ValidationError(`Malformed CSV in ${source}: unexpected record structure`);
  }
  return rows.data;
}

function cell(row: CsvRow, column: string): string {
  return row[column] ?? "";
}

function toDocumentRecord(row: CsvRow, line: number): DocumentRecord {
  for (const column of REQUIRED_COLUMNS) {
    if (cell(row, column) === "") {
      throw new ValidationError(`Line ${line}: ${column} must not be empty`, line);
    }
  }

  const expiryValue = cell(row, "expiry_date");
  const expiryDate = parseDate(expiryValue);
  if (!expiryDate) {
    throw new ValidationError(`Line ${line}: invalid expiry_date "${expiryValue}"`, line);
  }

  const startValue = cell(row, "start_date");
  const startDate = startValue === "" ? null : parseDate(startValue);
  if (startValue !== "" && !startDate) {
    throw new ValidationError(`Line ${line}: invalid start_date "${startValue}"`, line);
  }

  return createDocumentRecord({
    personName: cell(row, "person_name"),
    documentType: cell(row, "document_type"),
    startDate,
    expiryDate,
    remarks: cell(row, "remarks"),
  });
}

/**
 * Parse roster CSV text. The first invalid row aborts the import.
 */
export function parseDocumentsCsv(text: string, source = "<input>"): DocumentRecord[] {
  const rows = parseRows(text, source);
  if (rows.length === 0) {
    throw new ValidationError(`No document rows found in ${source}`);
  }

  const columns = Object.keys(rows[0]);
  const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    throw new ValidationError(`Missing required column(s) in ${source}: ${missing.join(", ")}`, 1);
  }

  return rows.map((row, index) => toDocumentRecord(row, index + 2));
}

/**
 * Read and parse the roster file
 */
export async function readDocumentsCsv(
  path: string,
  logger: Logger = documentLogger
): Promise<DocumentRecord[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new ConfigError(`Data file not found: ${path}`);
    }
    throw error;
  }

  const documents = parseDocumentsCsv(text, path);
  logger.info({ path, count: documents.length }, "Document roster loaded");
  return documents;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Warnings for records that parse but look wrong. An empty list means
 * nothing stood out.
 */
export function validateDocuments(documents: readonly DocumentRecord[]): string[] {
  const warnings: string[] = [];

  documents.forEach((doc, index) => {
    const label = `${doc.personName} / ${doc.documentType} (#${index + 1})`;
    if (!doc.expiryDate) {
      warnings.push(`${label}: no expiry date`);
    } else if (doc.startDate && doc.startDate >= doc.expiryDate) {
      warnings.push(`${label}: start date is not before expiry date`);
    }
  });

  return warnings;
}
