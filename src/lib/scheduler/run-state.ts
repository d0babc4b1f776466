/**
 * Scheduled run bookkeeping
 *
 * The daily run records the time of its last success; the morning catch-up
 * run reads it back and repeats the reminder run when the previous day's run
 * did not complete.
 */

import { mkdir, readFile, rename, stat, writeFile } from "node:fs/promises";
import { dirname, join, parse as parsePath } from "node:path";
import { differenceInCalendarDays, format, formatISO, isValid, parseISO } from "date-fns";
import { isNotFoundError } from "@/lib/errors";
import { jobLogger, type Logger } from "@/lib/logger";

export const DEFAULT_STATE_FILE = "logs/last_success_iso.txt";
export const DEFAULT_RUNNER_LOG_FILE = "logs/scheduled_runner.log";
export const MAX_RUNNER_LOG_BYTES = 1024 * 1024;

/**
 * Time of the last successful run, or null when none was recorded or the
 * state file cannot be read as a timestamp
 */
export async function readLastSuccess(
  file: string = DEFAULT_STATE_FILE,
  logger: Logger = jobLogger
): Promise<Date | null> {
  let text: string;
  try {
    text = (await readFile(file, "utf-8")).trim();
  } catch (error) {
    if (isNotFoundError(error)) return null;
    throw error;
  }

  if (text === "") return null;

  const parsed = parseISO(text);
  if (!isValid(parsed)) {
    logger.warn({ file, content: text }, "Ignoring unreadable last-success timestamp");
    return null;
  }
  return parsed;
}

/**
 * Record a successful run. Written to a temporary file first and renamed
 * into place.
 */
export async function writeLastSuccess(
  at: Date,
  file: string = DEFAULT_STATE_FILE
): Promise<void> {
  await mkdir(dirname(file), { recursive: true });
  const temp = `${file}.${process.pid}.tmp`;
  await writeFile(temp, formatISO(at), "utf-8");
  await rename(temp, file);
}

/**
 * True when no success was recorded or the last one happened before
 * yesterday
 */
export function needsCatchUp(lastSuccess: Date | null, now: Date): boolean {
  if (!lastSuccess) return true;
  return differenceInCalendarDays(now, lastSuccess) > 1;
}

/**
 * Move the runner log aside once it reaches `maxBytes`. Returns the archive
 * path, or null when nothing was rotated.
 */
export async function rotateLogIfNeeded(
  file: string = DEFAULT_RUNNER_LOG_FILE,
  now: Date = new Date(),
  maxBytes: number = MAX_RUNNER_LOG_BYTES
): Promise<string | null> {
  let size: number;
  try {
    size = (await stat(file)).size;
  } catch (error) {
    if (isNotFoundError(error)) return null;
    throw error;
  }

  if (size < maxBytes) return null;

  const { dir, name, ext } = parsePath(file);
  const archive = join(dir, `${name}_${format(now, "yyyyMMdd_HHmmss")}${ext}`);
  await rename(file, archive);
  return archive;
}
