import { errorMessage } from "@/lib/errors";
import { jobLogger, type Logger } from "@/lib/logger";
import { DEFAULT_STATE_FILE, needsCatchUp, readLastSuccess, writeLastSuccess } from "./run-state";

export const SCHEDULED_MODES = ["run", "catchup"] as const;
export type ScheduledMode = (typeof SCHEDULED_MODES)[number];

export interface ScheduledRunOptions {
  /** The reminder run itself; resolves to its exit code */
  run: () => Promise<number>;
  now?: Date;
  stateFile?: string;
  logger?: Logger;
}

export function isScheduledMode(value: string): value is ScheduledMode {
  return SCHEDULED_MODES.some((mode) => mode === value);
}

/**
 * `run` always runs; `catchup` runs only when the previous day's run is
 * missing. A successful run is recorded in the state file.
 * Returns the exit code, 2 for an unknown mode.
 */
export async function runScheduled(mode: string, options: ScheduledRunOptions): Promise<number> {
  const logger = options.logger ?? jobLogger.child({ job: "scheduled-runner" });
  const stateFile = options.stateFile ?? DEFAULT_STATE_FILE;
  const now = options.now ?? new Date();

  if (!isScheduledMode(mode)) {
    logger.error({ mode }, `Unknown mode, expected one of: ${SCHEDULED_MODES.join(", ")}`);
    return 2;
  }

  if (mode === "catchup") {
    const lastSuccess = await readLastSuccess(stateFile, logger);
    if (!needsCatchUp(lastSuccess, now)) {
      logger.info({ lastSuccess }, "Previous run succeeded, no catch-up needed");
      return 0;
    }
    logger.warn({ lastSuccess }, "Previous run missing, catching up");
  }

  let code: number;
  try {
    code = await options.run();
  } catch (error) {
    logger.error({ err: errorMessage(error) }, "Scheduled run crashed");
    return 1;
  }

  if (code === 0) {
    await writeLastSuccess(now, stateFile);
    logger.info({ mode }, "Scheduled run succeeded");
    return 0;
  }

  logger.error({ mode, code }, "Scheduled run failed");
  return 1;
}
