/**
 * Command line entry
 *
 *   document-expiry-reminder                 send the reminder mail (default)
 *   document-expiry-reminder --report        write the status report
 *   document-expiry-reminder --test-email    send a test mail
 *   document-expiry-reminder --create-sample write a sample roster
 *   document-expiry-reminder --init-config   write a configuration template
 */

import { parseArgs } from "node:util";
import { format } from "date-fns";
import { loadConfig, resolveDatedPath, writeDefaultConfig } from "@/lib/config";
import { getToday } from "@/lib/dates/date-resolver";
import type { TransportFactory } from "@/lib/email";
import { errorMessage } from "@/lib/errors";
import { createRunLogger, type Logger } from "@/lib/logger";
import { ReminderApp } from "./reminder-app";

export const DEFAULT_CONFIG_FILE = "config.yaml";
export const CONFIG_TEMPLATE_FILE = "config_templates/config_template.yaml";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: document-expiry-reminder [options]

Options:
  -c, --config <file>   configuration file (default: ${DEFAULT_CONFIG_FILE})
  -r, --report          write the document status report
  -o, --output <file>   status report output file
  -t, --test-email      send a test mail through the configured relays
  -s, --create-sample   write a sample roster to the configured data file
  -i, --init-config     write a configuration template to ${CONFIG_TEMPLATE_FILE}
  -v, --verbose         debug logging
  -h, --help            show this help`;

export interface CliOptions {
  config: string;
  report: boolean;
  output?: string;
  testEmail: boolean;
  createSample: boolean;
  initConfig: boolean;
  verbose: boolean;
  help: boolean;
}

export interface CliDependencies {
  transportFactory?: TransportFactory;
  clock?: () => Date;
  /** Replaces the per-run logger */
  logger?: Logger;
  print?: (line: string) => void;
}

/**
 * Parse command line arguments. Throws a TypeError on unknown options or
 * stray positionals.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      config: { type: "string", short: "c", default: DEFAULT_CONFIG_FILE },
      report: { type: "boolean", short: "r", default: false },
      output: { type: "string", short: "o" },
      "test-email": { type: "boolean", short: "t", default: false },
      "create-sample": { type: "boolean", short: "s", default: false },
      "init-config": { type: "boolean", short: "i", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    config: values.config ?? DEFAULT_CONFIG_FILE,
    report: values.report ?? false,
    output: values.output,
    testEmail: values["test-email"] ?? false,
    createSample: values["create-sample"] ?? false,
    initConfig: values["init-config"] ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}

/**
 * Run the CLI and return its exit code
 */
export async function main(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const clock = deps.clock ?? (() => new Date());

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    print(errorMessage(error));
    print(USAGE);
    return EXIT_USAGE;
  }

  if (options.help) {
    print(USAGE);
    return EXIT_SUCCESS;
  }

  if (options.initConfig) {
    await writeDefaultConfig(CONFIG_TEMPLATE_FILE);
    print(`Configuration template written to ${CONFIG_TEMPLATE_FILE}`);
    print(`Copy it to ${DEFAULT_CONFIG_FILE} and fill in the relay settings.`);
    return EXIT_SUCCESS;
  }

  let app: ReminderApp;
  try {
    const config = await loadConfig(options.config);
    const now = clock();
    const logger =
      deps.logger ??
      createRunLogger({
        runId: format(now, "yyyyMMddHHmmss"),
        level: options.verbose ? "debug" : config.logLevel,
        file: config.logFile ? resolveDatedPath(config.logFile, getToday(now)) : undefined,
      });

    logger.info({ config: options.config, dataFile: config.dataFile }, "Document expiry reminder starting");
    app = new ReminderApp(config, { logger, transportFactory: deps.transportFactory, clock });
  } catch (error) {
    print(`Startup failed: ${errorMessage(error)}`);
    return EXIT_FAILURE;
  }

  if (options.createSample) {
    return (await app.createSampleData()) ? EXIT_SUCCESS : EXIT_FAILURE;
  }

  if (options.testEmail) {
    const sent = await app.runTestEmail();
    print(sent ? "Test mail sent." : "Test mail could not be delivered, check the relay settings.");
    return sent ? EXIT_SUCCESS : EXIT_FAILURE;
  }

  if (options.report) {
    const path = await app.runReport(options.output);
    if (path) print(`Status report written to ${path}`);
    return path ? EXIT_SUCCESS : EXIT_FAILURE;
  }

  return (await app.runReminder()) ? EXIT_SUCCESS : EXIT_FAILURE;
}
