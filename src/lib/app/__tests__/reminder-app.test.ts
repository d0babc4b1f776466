import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { AppConfig } from "@/lib/config";
import type { OutgoingMessage, RelayConfig, TransportFactory } from "@/lib/email";
import {
  DEFAULT_BODY_TEMPLATE,
  DEFAULT_ROW_TEMPLATE,
  DEFAULT_SUBJECT_TEMPLATE,
  DEFAULT_TEST_SUBJECT,
} from "@/lib/email";
import { TemplateError } from "@/lib/errors";
import { createSilentLogger } from "@/lib/logger";
import { ReminderApp } from "../reminder-app";

// ----------------------------------------------------------------
// Fixtures
// ----------------------------------------------------------------

const logger = createSilentLogger();
const clock = () => new Date(2024, 5, 1, 9, 0);

const ROSTER = [
  "person_name,document_type,expiry_date,remarks",
  "Alice,Passport,2024-05-27,",
  "Bob,Visa,2024-06-11,",
  "Carol,Licence,2024-12-01,",
  "Dave,Visa,2024-05-30,已办理",
  "Eve,Permit,2024-07-31,",
].join("\n");

function relay(name: string): RelayConfig {
  return {
    name,
    host: `smtp.${name}.test`,
    port: 587,
    user: `sender@${name}.test`,
    password: "test-secret",
    senderName: "",
    tlsMode: "starttls",
  };
}

function fakeTransports(failing: string[] = []) {
  const sent: Array<{ relay: string; message: OutgoingMessage }> = [];
  const factory: TransportFactory = (config) => ({
    async verify() {
      if (failing.includes(config.name)) {
        throw Object.assign(new Error("Invalid login"), { code: "EAUTH" });
      }
    },
    async send(message) {
      sent.push({ relay: config.name, message: { ...message, to: [...message.to] } });
      return { messageId: `<${config.name}@test>`, accepted: [...message.to], rejected: [] };
    },
    close() {},
  });
  return { factory, sent };
}

describe("ReminderApp", () => {
  let dir: string;
  let config: AppConfig;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "expiry-app-"));
    config = {
      relays: [relay("primary"), relay("backup")],
      recipients: ["ops@example.com"],
      reminder: { daysBeforeExpiry: [60, 30, 7, 1] },
      report: { outputFilename: join(dir, "report_{date}.csv"), expiringSoonThreshold: 30 },
      templates: {
        subject: DEFAULT_SUBJECT_TEMPLATE,
        bodyHtml: DEFAULT_BODY_TEMPLATE,
        tableRowHtml: DEFAULT_ROW_TEMPLATE,
      },
      dataFile: join(dir, "roster.csv"),
      logLevel: "info",
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  // ----------------------------------------------------------------
  // runReminder
  // ----------------------------------------------------------------

  describe("runReminder", () => {
    it("sends one mail listing the candidates in order", async () => {
      await writeFile(config.dataFile, ROSTER, "utf-8");
      const { factory, sent } = fakeTransports();
      const app = new ReminderApp(config, { logger, transportFactory: factory, clock });

      expect(await app.runReminder()).toBe(true);

      expect(sent).toHaveLength(1);
      const { relay: used, message } = sent[0];
      expect(used).toBe("primary");
      expect(message.subject).toBe("证件到期提醒 - 3个证件需要关注 (2024-06-01)");
      expect(message.to).toEqual(["ops@example.com"]);
      expect(message.from).toBe("sender@primary.test");

      const positions = ["Alice", "Bob", "Eve"].map((name) => message.html.indexOf(`<td>${name}</td>`));
      expect(positions.every((position) => position >= 0)).toBe(true);
      expect([...positions].sort((a, b) => a - b)).toEqual(positions);
      expect(message.html).not.toContain("Carol");
      expect(message.html).not.toContain("Dave");
    });

    it("sends nothing when no document needs a reminder", async () => {
      await writeFile(config.dataFile, "person_name,document_type,expiry_date\nCarol,Licence,2024-12-01\n", "utf-8");
      const { factory, sent } = fakeTransports();
      const app = new ReminderApp(config, { logger, transportFactory: factory, clock });

      expect(await app.runReminder()).toBe(true);
      expect(sent).toEqual([]);
    });

    it("fails over to the backup relay", async () => {
      await writeFile(config.dataFile, ROSTER, "utf-8");
      const { factory, sent } = fakeTransports(["primary"]);
      const app = new ReminderApp(config, { logger, transportFactory: factory, clock });

      expect(await app.runReminder()).toBe(true);
      expect(sent.map((s) => [s.relay, s.message.from])).toEqual([["backup", "sender@backup.test"]]);
    });

    it("reports failure when every relay fails", async () => {
      await writeFile(config.dataFile, ROSTER, "utf-8");
      const { factory } = fakeTransports(["primary", "backup"]);
      const app = new ReminderApp(config, { logger, transportFactory: factory, clock });

      expect(await app.runReminder()).toBe(false);
    });

    it("reports failure for a missing data file", async () => {
      const app = new ReminderApp(config, { logger, transportFactory: fakeTransports().factory, clock });

      expect(await app.runReminder()).toBe(false);
    });

    it("reports failure for an invalid roster", async () => {
      await writeFile(config.dataFile, "person_name,document_type,expiry_date\nAlice,Visa,someday\n", "utf-8");
      const app = new ReminderApp(config, { logger, transportFactory: fakeTransports().factory, clock });

      expect(await app.runReminder()).toBe(false);
    });
  });

  // ----------------------------------------------------------------
  // runReport
  // ----------------------------------------------------------------

  describe("runReport", () => {
    it("writes the sorted status report to the dated default path", async () => {
      await writeFile(config.dataFile, ROSTER, "utf-8");
      const app = new ReminderApp(config, { logger, transportFactory: fakeTransports().factory, clock });

      const path = await app.runReport();

      expect(path).toBe(join(dir, "report_20240601.csv"));
      const lines = (await readFile(join(dir, "report_20240601.csv"), "utf-8")).split("\r\n");
      expect(lines.slice(1)).toEqual([
        "Alice,Passport,,2024-05-27,,-5,已过期,是",
        "Dave,Visa,,2024-05-30,已办理,-2,已过期,否",
        "Bob,Visa,,2024-06-11,,10,即将过期,是",
        "Eve,Permit,,2024-07-31,,60,有效,是",
        "Carol,Licence,,2024-12-01,,183,有效,否",
        "",
      ]);
    });

    it("writes to an explicit output path", async () => {
      await writeFile(config.dataFile, ROSTER, "utf-8");
      const app = new ReminderApp(config, { logger, transportFactory: fakeTransports().factory, clock });
      const output = join(dir, "out", "custom.csv");

      expect(await app.runReport(output)).toBe(output);
    });

    it("returns null when the roster cannot be read", async () => {
      const app = new ReminderApp(config, { logger, transportFactory: fakeTransports().factory, clock });

      expect(await app.runReport()).toBeNull();
    });
  });

  // ----------------------------------------------------------------
  // Other runs
  // ----------------------------------------------------------------

  it("sends a test mail", async () => {
    const { factory, sent } = fakeTransports();
    const app = new ReminderApp(config, { logger, transportFactory: factory, clock });

    expect(await app.runTestEmail()).toBe(true);
    expect(sent[0].message.subject).toBe(DEFAULT_TEST_SUBJECT);
    expect(sent[0].message.html).toContain("2024-06-01 09:00:00");
  });

  it("creates sample data that feeds a reminder run", async () => {
    const { factory, sent } = fakeTransports();
    const app = new ReminderApp(config, { logger, transportFactory: factory, clock });

    expect(await app.createSampleData()).toBe(true);
    expect(await app.runReminder()).toBe(true);
    expect(sent[0].message.subject).toBe("证件到期提醒 - 4个证件需要关注 (2024-06-01)");
  });

  it("rejects templates without required placeholders at construction", () => {
    const broken = { ...config, templates: { ...config.templates, subject: "Reminder" } };

    expect(() => new ReminderApp(broken, { logger, clock })).toThrow(TemplateError);
  });
});
