import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { dump } from "js-yaml";
import type { TransportFactory } from "@/lib/email";
import { createSilentLogger } from "@/lib/logger";
import { EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE, USAGE, main, parseCliArgs } from "../cli";

describe("parseCliArgs", () => {
  it("defaults to a reminder run with config.yaml", () => {
    expect(parseCliArgs([])).toEqual({
      config: "config.yaml",
      report: false,
      output: undefined,
      testEmail: false,
      createSample: false,
      initConfig: false,
      verbose: false,
      help: false,
    });
  });

  it("reads short flags", () => {
    const options = parseCliArgs(["-c", "custom.yaml", "-r", "-o", "out.csv", "-v"]);

    expect(options.config).toBe("custom.yaml");
    expect(options.report).toBe(true);
    expect(options.output).toBe("out.csv");
    expect(options.verbose).toBe(true);
  });

  it("reads long flags", () => {
    const options = parseCliArgs(["--test-email", "--create-sample", "--init-config"]);

    expect(options.testEmail).toBe(true);
    expect(options.createSample).toBe(true);
    expect(options.initConfig).toBe(true);
  });

  it("rejects unknown options", () => {
    expect(() => parseCliArgs(["--dry-run"])).toThrow();
  });
});

describe("main", () => {
  let dir: string;
  let configPath: string;
  let lines: string[];
  const logger = createSilentLogger();
  const clock = () => new Date(2024, 5, 1, 9, 0);

  const sentSubjects: string[] = [];
  const transportFactory: TransportFactory = () => ({
    async verify() {},
    async send(message) {
      sentSubjects.push(message.subject);
      return { messageId: "<cli@test>", accepted: [...message.to], rejected: [] };
    },
    close() {},
  });

  function deps() {
    return { logger, clock, transportFactory, print: (line: string) => lines.push(line) };
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "expiry-cli-"));
    configPath = join(dir, "config.yaml");
    lines = [];
    sentSubjects.length = 0;

    await writeFile(
      configPath,
      dump({
        email: {
          smtp_server: "smtp.example.com",
          smtp_port: 587,
          smtp_user: "sender@example.com",
          smtp_password: "test-secret",
          sender_name: "",
          receiver_email: "ops@example.com",
          use_ssl: false,
          use_tls: true,
        },
        reminder: { days_before_expiry: [30] },
        report: { output_filename: join(dir, "report_{date}.csv") },
        mail_template: {},
        data_file: join(dir, "roster.csv"),
      }),
      "utf-8"
    );
    await writeFile(
      join(dir, "roster.csv"),
      "person_name,document_type,expiry_date\nAlice,Passport,2024-06-08\nBob,Visa,2025-06-01\n",
      "utf-8"
    );
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("prints usage for --help", async () => {
    expect(await main(["--help"], deps())).toBe(EXIT_SUCCESS);
    expect(lines).toEqual([USAGE]);
  });

  it("exits with the usage code on unknown options", async () => {
    expect(await main(["--dry-run"], deps())).toBe(EXIT_USAGE);
    expect(lines[1]).toBe(USAGE);
  });

  it("fails when the configuration file is missing", async () => {
    const missing = join(dir, "missing.yaml");

    expect(await main(["-c", missing], deps())).toBe(EXIT_FAILURE);
    expect(lines).toEqual([`Startup failed: Configuration file not found: ${missing}`]);
  });

  it("runs the reminder by default", async () => {
    expect(await main(["-c", configPath], deps())).toBe(EXIT_SUCCESS);
    expect(sentSubjects).toEqual(["证件到期提醒 - 1个证件需要关注 (2024-06-01)"]);
  });

  it("writes the report to the given output", async () => {
    const output = join(dir, "status.csv");

    expect(await main(["-c", configPath, "--report", "-o", output], deps())).toBe(EXIT_SUCCESS);
    expect(lines).toEqual([`Status report written to ${output}`]);
    expect((await readFile(output, "utf-8")).split("\r\n")[1]).toBe(
      "Alice,Passport,,2024-06-08,,7,即将过期,是"
    );
  });

  it("sends a test mail", async () => {
    expect(await main(["-c", configPath, "-t"], deps())).toBe(EXIT_SUCCESS);
    expect(lines).toEqual(["Test mail sent."]);
    expect(sentSubjects).toEqual(["证件管理系统 - 测试邮件"]);
  });
});
