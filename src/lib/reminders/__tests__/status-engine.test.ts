import { describe, it, expect } from "vitest";
import { createDocumentRecord, type DocumentRecord } from "@/lib/documents/types";
import { ConfigError } from "@/lib/errors";
import { createSilentLogger } from "@/lib/logger";
import { StatusEngine, countStatusDistribution } from "../status-engine";

const today = new Date(2024, 5, 1);
const logger = createSilentLogger();

function doc(expiryDate: Date | null, personName = "Test Person"): DocumentRecord {
  return createDocumentRecord({ personName, documentType: "Passport", expiryDate });
}

describe("StatusEngine", () => {
  const engine = new StatusEngine({ expiringSoonThreshold: 30, logger });

  describe("classify", () => {
    it("classifies negative values as expired", () => {
      expect(engine.classify(-1)).toBe("EXPIRED");
    });

    it("classifies 0 up to the threshold as expiring soon", () => {
      expect(engine.classify(0)).toBe("EXPIRING_SOON");
      expect(engine.classify(30)).toBe("EXPIRING_SOON");
    });

    it("classifies values beyond the threshold as valid", () => {
      expect(engine.classify(31)).toBe("VALID");
    });
  });

  describe("compute", () => {
    it("fills daysLeft and status in place", () => {
      const documents = [
        doc(new Date(2024, 4, 27)),
        doc(new Date(2024, 5, 1)),
        doc(new Date(2024, 6, 1)),
        doc(new Date(2024, 6, 2)),
      ];

      const result = engine.compute(documents, today);

      expect(result).toBe(documents);
      expect(documents.map((d) => [d.daysLeft, d.status])).toEqual([
        [-5, "EXPIRED"],
        [0, "EXPIRING_SOON"],
        [30, "EXPIRING_SOON"],
        [31, "VALID"],
      ]);
    });

    it("marks documents without expiry date as unknown and never flagged", () => {
      const documents = [doc(null)];

      engine.compute(documents, today);

      expect(documents[0].daysLeft).toBeNull();
      expect(documents[0].status).toBe("UNKNOWN");
      expect(documents[0].needsReminder).toBe(false);
    });

    it("leaves needsReminder untouched for dated documents", () => {
      const documents = [doc(new Date(2024, 5, 10))];

      engine.compute(documents, today);

      expect(documents[0].needsReminder).toBeNull();
    });

    it("produces identical results when run twice", () => {
      const documents = [doc(new Date(2024, 4, 27)), doc(null), doc(new Date(2025, 0, 1))];

      engine.compute(documents, today);
      const first = documents.map((d) => ({ ...d }));
      engine.compute(documents, today);

      expect(documents).toEqual(first);
    });

    it("respects a zero threshold", () => {
      const strict = new StatusEngine({ expiringSoonThreshold: 0, logger });
      const documents = [doc(new Date(2024, 5, 1)), doc(new Date(2024, 5, 2))];

      strict.compute(documents, today);

      expect(documents.map((d) => d.status)).toEqual(["EXPIRING_SOON", "VALID"]);
    });
  });

  it("rejects a negative threshold", () => {
    expect(() => new StatusEngine({ expiringSoonThreshold: -1, logger })).toThrow(ConfigError);
  });

  it("rejects a fractional threshold", () => {
    expect(() => new StatusEngine({ expiringSoonThreshold: 1.5, logger })).toThrow(ConfigError);
  });
});

describe("countStatusDistribution", () => {
  it("counts by status label", () => {
    const engine = new StatusEngine({ expiringSoonThreshold: 30, logger });
    const documents = engine.compute(
      [doc(new Date(2024, 4, 1)), doc(new Date(2024, 5, 5)), doc(new Date(2024, 5, 6)), doc(null)],
      today
    );

    expect(countStatusDistribution(documents)).toEqual({
      已过期: 1,
      即将过期: 2,
      未知: 1,
    });
  });

  it("counts unclassified documents as unknown", () => {
    expect(countStatusDistribution([doc(new Date(2024, 5, 5))])).toEqual({ 未知: 1 });
  });
});
