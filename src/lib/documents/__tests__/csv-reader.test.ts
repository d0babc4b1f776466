import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError, ValidationError } from "@/lib/errors";
import { createSilentLogger } from "@/lib/logger";
import { parseDocumentsCsv, readDocumentsCsv, validateDocuments } from "../csv-reader";
import { createDocumentRecord } from "../types";

function validationErrorOf(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error("expected a ValidationError");
}

// =============================================================================
// parseDocumentsCsv
// =============================================================================

describe("parseDocumentsCsv", () => {
  it("reads all columns", () => {
    const documents = parseDocumentsCsv(
      [
        "person_name,document_type,start_date,expiry_date,remarks",
        "Alice,Passport,2020-01-01,2030-01-01,HR",
        "Bob,Visa,,20250315,",
      ].join("\n")
    );

    expect(documents).toEqual([
      {
        personName: "Alice",
        documentType: "Passport",
        startDate: new Date(2020, 0, 1),
        expiryDate: new Date(2030, 0, 1),
        remarks: "HR",
        daysLeft: null,
        status: null,
        needsReminder: null,
      },
      {
        personName: "Bob",
        documentType: "Visa",
        startDate: null,
        expiryDate: new Date(2025, 2, 15),
        remarks: "",
        daysLeft: null,
        status: null,
        needsReminder: null,
      },
    ]);
  });

  it("accepts files without the optional columns", () => {
    const [doc] = parseDocumentsCsv("person_name,document_type,expiry_date\nCarol,Licence,2026/05/01\n");

    expect(doc.startDate).toBeNull();
    expect(doc.remarks).toBe("");
    expect(doc.expiryDate).toEqual(new Date(2026, 4, 1));
  });

  it("strips a byte order mark and surrounding whitespace", () => {
    const [doc] = parseDocumentsCsv(
      "\uFEFF person_name , document_type ,expiry_date\r\n  Dave , Visa ,2026-01-01\r\n"
    );

    expect(doc.personName).toBe("Dave");
    expect(doc.documentType).toBe("Visa");
  });

  it("skips blank lines", () => {
    const documents = parseDocumentsCsv(
      "person_name,document_type,expiry_date\n\nEve,Visa,2026-01-01\n\n"
    );

    expect(documents).toHaveLength(1);
  });

  it("rejects an empty file", () => {
    expect(() => parseDocumentsCsv("", "roster.csv")).toThrow("No document rows found in roster.csv");
    expect(() => parseDocumentsCsv("person_name,document_type,expiry_date\n")).toThrow(ValidationError);
  });

  it("rejects a missing required column", () => {
    const error = validationErrorOf(() => parseDocumentsCsv("person_name,expiry_date\nAlice,2030-01-01\n"));

    expect(error.message).toBe("Missing required column(s) in <input>: document_type");
    expect(error.line).toBe(1);
  });

  it("reports an empty required cell with its file line", () => {
    const error = validationErrorOf(() =>
      parseDocumentsCsv("person_name,document_type,expiry_date\nAlice,Visa,2030-01-01\nBob,,2030-01-01\n")
    );

    expect(error.message).toBe("Line 3: document_type must not be empty");
    expect(error.line).toBe(3);
  });

  it("rejects an unparsable expiry date", () => {
    const error = validationErrorOf(() =>
      parseDocumentsCsv("person_name,document_type,expiry_date\nAlice,Visa,2024-13-01\n")
    );

    expect(error.message).toBe('Line 2: invalid expiry_date "2024-13-01"');
    expect(error.line).toBe(2);
  });

  it("rejects a two-digit year", () => {
    expect(() => parseDocumentsCsv("person_name,document_type,expiry_date\nAlice,护照,01/06/26\n")).toThrow(
      'Line 2: invalid expiry_date "01/06/26"'
    );
  });

  it("rejects an unparsable start date", () => {
    expect(() =>
      parseDocumentsCsv("person_name,document_type,start_date,expiry_date\nAlice,Visa,soon,2030-01-01\n")
    ).toThrow('Line 2: invalid start_date "soon"');
  });

  it("rejects malformed CSV", () => {
    expect(() => parseDocumentsCsv("person_name,document_type,expiry_date\nAlice,Visa\n")).toThrow(
      /^Malformed CSV in <input>/
    );
  });
});

// =============================================================================
// readDocumentsCsv
// =============================================================================

describe("readDocumentsCsv", () => {
  let dir: string;
  const logger = createSilentLogger();

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "expiry-roster-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a roster file", async () => {
    const path = join(dir, "roster.csv");
    await writeFile(path, "person_name,document_type,expiry_date\n张三,身份证,2030年01月01日\n", "utf-8");

    const documents = await readDocumentsCsv(path, logger);

    expect(documents.map((d) => [d.personName, d.documentType])).toEqual([["张三", "身份证"]]);
    expect(documents[0].expiryDate).toEqual(new Date(2030, 0, 1));
  });

  it("reports a missing file as a configuration problem", async () => {
    const path = join(dir, "missing.csv");

    await expect(readDocumentsCsv(path, logger)).rejects.toThrow(ConfigError);
    await expect(readDocumentsCsv(path, logger)).rejects.toThrow(`Data file not found: ${path}`);
  });
});

// =============================================================================
// validateDocuments
// =============================================================================

describe("validateDocuments", () => {
  it("warns about suspicious records", () => {
    const warnings = validateDocuments([
      createDocumentRecord({
        personName: "Alice",
        documentType: "Passport",
        startDate: new Date(2030, 0, 1),
        expiryDate: new Date(2030, 0, 1),
      }),
      createDocumentRecord({ personName: "Bob", documentType: "Visa" }),
      createDocumentRecord({
        personName: "Carol",
        documentType: "Visa",
        startDate: new Date(2020, 0, 1),
        expiryDate: new Date(2030, 0, 1),
      }),
    ]);

    expect(warnings).toEqual([
      "Alice / Passport (#1): start date is not before expiry date",
      "Bob / Visa (#2): no expiry date",
    ]);
  });
});
