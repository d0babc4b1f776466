/**
 * Configuration Service
 *
 * Loads the YAML configuration file, validates it and normalizes it into the
 * canonical AppConfig. Every problem found is reported as a ConfigError before
 * any document is processed.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { dump, load } from "js-yaml";
import type { ZodError } from "zod";
import { COMPACT_DATE_FORMAT, formatDate } from "@/lib/dates/date-resolver";
import { ConfigError, errorMessage, isNotFoundError } from "@/lib/errors";
import { configLogger, type LogLevel } from "@/lib/logger";
import { parseRecipients, validateRecipients } from "@/lib/email/recipients";
import type { RelayConfig, ReminderTemplates, TlsMode } from "@/lib/email/types";
import {
  DEFAULT_BODY_TEMPLATE,
  DEFAULT_ROW_TEMPLATE,
  DEFAULT_SUBJECT_TEMPLATE,
} from "@/lib/email/templates";
import {
  appConfigFileSchema,
  legacyEmailSchema,
  multiRelayEmailSchema,
  DEFAULT_DATA_FILE,
  DEFAULT_REPORT_FILENAME,
  type EmailConfigShape,
  type RelayEntry,
} from "./schema";

// =============================================================================
// TYPES
// =============================================================================

export interface AppConfig {
  /** Primary relay first, then backups in preference order */
  relays: RelayConfig[];
  recipients: string[];
  reminder: {
    daysBeforeExpiry: number[];
  };
  report: {
    outputFilename: string;
    expiringSoonThreshold: number;
  };
  templates: ReminderTemplates;
  dataFile: string;
  logLevel: LogLevel;
  logFile?: string;
}

// =============================================================================
// EMAIL SHAPES
// =============================================================================

function formatIssues(error: ZodError, prefix?: string): string[] {
  return error.errors.map((issue) => {
    const path = [prefix, ...issue.path].filter((part) => part !== undefined).join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Decide which email shape the section uses and validate it against that
 * shape's schema
 */
export function detectEmailShape(email: Record<string, unknown>): EmailConfigShape {
  if ("primary" in email) {
    const parsed = multiRelayEmailSchema.safeParse(email);
    if (!parsed.success) {
      throw new ConfigError("Invalid email configuration", formatIssues(parsed.error, "email"));
    }
    return { kind: "multi-relay", config: parsed.data };
  }

  const parsed = legacyEmailSchema.safeParse(email);
  if (!parsed.success) {
    throw new ConfigError("Invalid email configuration", formatIssues(parsed.error, "email"));
  }
  return { kind: "legacy", config: parsed.data };
}

/**
 * TLS mode of the legacy boolean flags; use_ssl wins over use_tls
 */
export function legacyTlsMode(useSsl: boolean, useTls: boolean): TlsMode {
  if (useSsl) return "ssl";
  if (useTls) return "starttls";
  return "plain";
}

function defaultTlsMode(port: number): TlsMode {
  return port === 465 ? "ssl" : "starttls";
}

function toRelayConfig(entry: RelayEntry, fallbackName: string): RelayConfig {
  return {
    name: entry.name ?? fallbackName,
    host: entry.smtp_server,
    port: entry.smtp_port,
    user: entry.smtp_user,
    password: entry.smtp_password,
    senderName: entry.sender_name,
    tlsMode: entry.tls_mode ?? defaultTlsMode(entry.smtp_port),
  };
}

/**
 * Canonical relay list and the raw receiver string of either shape
 */
export function normalizeEmailConfig(shape: EmailConfigShape): {
  relays: RelayConfig[];
  receiverEmail: string;
} {
  switch (shape.kind) {
    case "legacy": {
      const { config } = shape;
      return {
        relays: [
          {
            name: "primary",
            host: config.smtp_server,
            port: config.smtp_port,
            user: config.smtp_user,
            password: config.smtp_password,
            senderName: config.sender_name,
            tlsMode: legacyTlsMode(config.use_ssl, config.use_tls),
          },
        ],
        receiverEmail: config.receiver_email,
      };
    }
    case "multi-relay": {
      const { config } = shape;
      return {
        relays: [
          toRelayConfig(config.primary, "primary"),
          ...config.backups.map((entry, index) => toRelayConfig(entry, `backup-${index + 1}`)),
        ],
        receiverEmail: config.receiver_email,
      };
    }
  }
}

// =============================================================================
// LOADING
// =============================================================================

/**
 * Validate an already-parsed configuration document
 */
export function parseConfig(raw: unknown): AppConfig {
  const parsed = appConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError("Invalid configuration", formatIssues(parsed.error));
  }

  const file = parsed.data;
  const { relays, receiverEmail } = normalizeEmailConfig(detectEmailShape(file.email));

  const recipients = parseRecipients(receiverEmail);
  const recipientIssues = validateRecipients(recipients);
  if (recipientIssues.length > 0) {
    throw new ConfigError("Invalid email configuration", recipientIssues);
  }

  return {
    relays,
    recipients,
    reminder: {
      daysBeforeExpiry: file.reminder.days_before_expiry,
    },
    report: {
      outputFilename: file.report.output_filename,
      expiringSoonThreshold: file.report.days_until_expiring_threshold,
    },
    templates: {
      subject: file.mail_template.subject,
      bodyHtml: file.mail_template.body_html,
      tableRowHtml: file.mail_template.table_row_html,
    },
    dataFile: file.data_file,
    logLevel: file.log_level,
    logFile: file.log_file,
  };
}

/**
 * Read, parse and validate the YAML configuration file
 */
export async function loadConfig(path: string): Promise<AppConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new ConfigError(`Configuration file not found: ${path}`);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = load(text);
  } catch (error) {
    throw new ConfigError(`Configuration file is not valid YAML: ${path}`, [errorMessage(error)]);
  }

  const config = parseConfig(raw);

  configLogger.info(
    {
      path,
      relays: config.relays.map((relay) => `${relay.name} (${relay.host}:${relay.port})`),
      recipients: config.recipients.length,
    },
    "Configuration loaded"
  );

  return config;
}

/**
 * Replace the {date} placeholder of a configured file name with yyyyMMdd
 */
export function resolveDatedPath(pattern: string, today: Date): string {
  return pattern.split("{date}").join(formatDate(today, COMPACT_DATE_FORMAT));
}

// =============================================================================
// DEFAULT TEMPLATE
// =============================================================================

export const DEFAULT_CONFIG_TEMPLATE = {
  email: {
    receiver_email: "recipient@example.com",
    primary: {
      name: "primary",
      smtp_server: "smtp.example.com",
      smtp_port: 587,
      smtp_user: "your_email@example.com",
      smtp_password: "your_auth_code",
      sender_name: "证件管理系统",
      tls_mode: "starttls",
    },
    backups: [
      {
        name: "backup",
        smtp_server: "smtp.backup.example.com",
        smtp_port: 465,
        smtp_user: "backup_sender@example.com",
        smtp_password: "your_auth_code",
        sender_name: "证件管理系统",
        tls_mode: "ssl",
      },
    ],
  },
  reminder: {
    days_before_expiry: [60, 30, 7, 1],
  },
  report: {
    output_filename: DEFAULT_REPORT_FILENAME,
    days_until_expiring_threshold: 30,
  },
  mail_template: {
    subject: DEFAULT_SUBJECT_TEMPLATE,
    body_html: DEFAULT_BODY_TEMPLATE,
    table_row_html: DEFAULT_ROW_TEMPLATE,
  },
  data_file: DEFAULT_DATA_FILE,
  log_level: "info",
  log_file: "logs/document_reminder_{date}.log",
};

export function renderDefaultConfig(): string {
  return dump(DEFAULT_CONFIG_TEMPLATE, { indent: 2, lineWidth: -1, noRefs: true });
}

export async function writeDefaultConfig(path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, renderDefaultConfig(), "utf-8");
}
