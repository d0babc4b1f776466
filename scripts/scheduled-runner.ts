/**
 * Scheduled wrapper around the reminder CLI
 *
 *   tsx scripts/scheduled-runner.ts run      daily run (21:00)
 *   tsx scripts/scheduled-runner.ts catchup  morning check (10:30), repeats
 *                                            a missed daily run
 */

import { main } from "@/lib/app/cli";
import { createRunLogger } from "@/lib/logger";
import {
  DEFAULT_RUNNER_LOG_FILE,
  rotateLogIfNeeded,
} from "@/lib/scheduler/run-state";
import { runScheduled } from "@/lib/scheduler/scheduled-runner";

async function run(): Promise<number> {
  const mode = process.argv[2] ?? "run";

  await rotateLogIfNeeded(DEFAULT_RUNNER_LOG_FILE);
  const logger = createRunLogger({ runId: `scheduled-${mode}`, file: DEFAULT_RUNNER_LOG_FILE });

  const code = await runScheduled(mode, { run: () => main([]), logger });
  if (code === 2) {
    console.error("Usage: tsx scripts/scheduled-runner.ts [run|catchup]");
  }
  return code;
}

run()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    console.error("Error:", e instanceof Error ? e.message : String(e));
    process.exitCode = 1;
  });
