import type { MonitorState } from "@/lib/domain/models";
import type { PipelineOptionInput } from "../config";
import { CliError } from "../errors";
import type { CommandResult } from "../output";
import { printSuccessLine } from "../output";
import type { CommandContext } from "./common";
import { openPipeline } from "./common";

export interface MonitorCommandOptions extends PipelineOptionInput {
  interval?: number;
  batchLimit?: number;
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

/** Runs the monitor in the foreground until the signal aborts. */
export async function executeMonitorCommand(
  options: MonitorCommandOptions,
  context: CommandContext = {},
): Promise<CommandResult<MonitorState & { ok: true }>> {
  const { signal } = context;
  if (!signal) {
    throw new CliError(1, "monitor needs an abort signal to know when to stop");
  }

  const pipeline = await openPipeline(options, context);
  const monitor = pipeline.createMonitor({
    pollIntervalSeconds: options.interval,
    batchLimit: options.batchLimit,
  });

  if (!(await monitor.start())) {
    throw new CliError(5, "monitor could not be started");
  }
  await waitForAbort(signal);
  await monitor.stop();
  await monitor.waitUntilIdle();

  const state = monitor.getState();
  return {
    payload: { ok: true, ...state },
    lines: [
      printSuccessLine("Monitor stopped"),
      `Checks: ${state.total_checks}`,
      `Articles: found ${state.total_articles_found}, processed ${state.total_articles_processed}, created ${state.total_articles_created}`,
    ],
  };
}
