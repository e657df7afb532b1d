#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";

import { executeMonitorCommand } from "./commands/monitor";
import { executeRunCommand } from "./commands/run";
import { executeStatusCommand } from "./commands/status";
import { parseBoundedInt } from "./config";
import { bootstrapEnvFromDotenv } from "./env";
import { CliError } from "./errors";
import { printCommandResult } from "./output";

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`invalid positive integer: ${value}`);
  }
  return parsed;
}

function addCommonOptions(command: Command): Command {
  return command
    .option("--config-dir <dir>", "configuration directory (overrides FEEDPRESS_CONFIG_DIR)")
    .option("--data-dir <dir>", "state, log and cache directory (overrides FEEDPRESS_DATA_DIR)")
    .option("--json", "JSON output");
}

/** Aborts on the first SIGINT/SIGTERM; a second one exits immediately. */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  const onSignal = () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    process.stderr.write("Stopping after the current article...\n");
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  return controller.signal;
}

async function run() {
  bootstrapEnvFromDotenv();

  const program = new Command();
  program
    .name("feedpress")
    .description("Feed-to-WordPress pipeline CLI (single run, continuous monitor, status)")
    .version("0.1.0");

  addCommonOptions(
    program
      .command("run")
      .description("Fetch, rewrite and publish new articles once")
      .option("--limit <n>", "maximum number of articles (overrides ARTICLES_LIMIT)", parsePositiveInt)
      .option("--dry-run", "process articles without creating WordPress posts")
      .action(async (options) => {
        const result = await executeRunCommand(options, { signal: interruptSignal() });
        printCommandResult(result, Boolean(options.json));
      }),
  );

  addCommonOptions(
    program
      .command("monitor")
      .description("Check the feeds on a timer until interrupted")
      .option("--interval <seconds>", "seconds between checks (overrides MONITOR_POLL_INTERVAL)", (value) =>
        parseBoundedInt("interval", value, 10, 86_400),
      )
      .option("--batch-limit <n>", "maximum articles per check", parsePositiveInt)
      .option("--dry-run", "process articles without creating WordPress posts")
      .action(async (options) => {
        const result = await executeMonitorCommand(options, { signal: interruptSignal() });
        printCommandResult(result, Boolean(options.json));
      }),
  );

  addCommonOptions(
    program
      .command("status")
      .description("Show the last run and the monitor state")
      .action(async (options) => {
        const result = await executeStatusCommand(options);
        printCommandResult(result, Boolean(options.json));
      }),
  );

  await program.parseAsync(process.argv);
}

function printError(error: unknown): void {
  const jsonMode = process.argv.includes("--json");
  if (error instanceof CliError) {
    if (jsonMode) {
      process.stderr.write(`${JSON.stringify(error.toJSON(), null, 2)}\n`);
    } else {
      process.stderr.write(`Error: ${error.message}\n`);
      if (error.hint) {
        process.stderr.write(`Hint: ${error.hint}\n`);
      }
    }
    process.exit(error.code);
  }

  const message = error instanceof Error ? error.message : String(error);
  if (jsonMode) {
    process.stderr.write(`${JSON.stringify({ ok: false, error: { code: 1, message } }, null, 2)}\n`);
  } else {
    process.stderr.write(`Error: ${message}\n`);
  }
  process.exit(1);
}

run().catch(printError);
