/**
 * Configuration file schemas
 *
 * The `email` section comes in two shapes:
 * - legacy: a single relay described inline (`smtp_server`, `use_ssl`, ...)
 * - multi-relay: `primary` plus an ordered `backups` list
 *
 * Both are normalized once into the canonical RelayConfig list; nothing
 * outside this module sees the raw shapes.
 */

import { z } from "zod";
import { LOG_LEVELS } from "@/lib/logger";
import {
  DEFAULT_BODY_TEMPLATE,
  DEFAULT_ROW_TEMPLATE,
  DEFAULT_SUBJECT_TEMPLATE,
} from "@/lib/email/templates";
import { DEFAULT_EXPIRING_SOON_THRESHOLD, DEFAULT_REMINDER_DAYS } from "@/lib/reminders/reminder-types";

export const DEFAULT_DATA_FILE = "sample_data/人员证件信息.csv";
export const DEFAULT_REPORT_FILENAME = "证件状态报告_{date}.csv";

// =============================================================================
// Email
// =============================================================================

const portSchema = z
  .number({ invalid_type_error: "Port must be a number" })
  .int("Port must be an integer")
  .min(1, "Port must be between 1 and 65535")
  .max(65535, "Port must be between 1 and 65535");

export const tlsModeSchema = z.enum(["ssl", "starttls", "plain"]);

export const legacyEmailSchema = z.object({
  smtp_server: z.string().min(1, "smtp_server must not be empty"),
  smtp_port: portSchema,
  smtp_user: z.string().min(1, "smtp_user must not be empty"),
  smtp_password: z.string().min(1, "smtp_password must not be empty"),
  sender_name: z.string(),
  receiver_email: z.string().min(1, "receiver_email must not be empty"),
  use_ssl: z.boolean().default(true),
  use_tls: z.boolean().default(false),
});

export const relayEntrySchema = z.object({
  name: z.string().min(1).optional(),
  smtp_server: z.string().min(1, "smtp_server must not be empty"),
  smtp_port: portSchema,
  smtp_user: z.string().min(1, "smtp_user must not be empty"),
  smtp_password: z.string().min(1, "smtp_password must not be empty"),
  sender_name: z.string().default(""),
  tls_mode: tlsModeSchema.optional(),
});

export const multiRelayEmailSchema = z.object({
  receiver_email: z.string().min(1, "receiver_email must not be empty"),
  primary: relayEntrySchema,
  backups: z.array(relayEntrySchema).default([]),
});

export type LegacyEmailConfig = z.infer<typeof legacyEmailSchema>;
export type MultiRelayEmailConfig = z.infer<typeof multiRelayEmailSchema>;
export type RelayEntry = z.infer<typeof relayEntrySchema>;

/**
 * Tagged union of the two accepted email shapes
 */
export type EmailConfigShape =
  | { kind: "legacy"; config: LegacyEmailConfig }
  | { kind: "multi-relay"; config: MultiRelayEmailConfig };

// =============================================================================
// Application
// =============================================================================

const logLevelSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .transform((value) => (value === "warning" ? "warn" : value === "critical" ? "fatal" : value))
  .pipe(z.enum(LOG_LEVELS));

export const appConfigFileSchema = z.object({
  email: z.record(z.unknown()),
  reminder: z.object({
    days_before_expiry: z
      .array(z.number().int("Reminder days must be integers").min(0, "Reminder days must not be negative"))
      .default([...DEFAULT_REMINDER_DAYS]),
  }),
  report: z.object({
    output_filename: z.string().min(1).default(DEFAULT_REPORT_FILENAME),
    days_until_expiring_threshold: z
      .number()
      .int()
      .min(0, "days_until_expiring_threshold must not be negative")
      .default(DEFAULT_EXPIRING_SOON_THRESHOLD),
  }),
  mail_template: z.object({
    subject: z.string().min(1).default(DEFAULT_SUBJECT_TEMPLATE),
    body_html: z.string().min(1).default(DEFAULT_BODY_TEMPLATE),
    table_row_html: z.string().min(1).default(DEFAULT_ROW_TEMPLATE),
  }),
  data_file: z.string().min(1).default(DEFAULT_DATA_FILE),
  log_level: logLevelSchema.default("info"),
  log_file: z.string().min(1).optional(),
});

export type AppConfigFile = z.infer<typeof appConfigFileSchema>;
