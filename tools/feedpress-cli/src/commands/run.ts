import type { RunReport } from "@/lib/domain/models";
import type { PipelineOptionInput } from "../config";
import { CliError } from "../errors";
import type { CommandResult } from "../output";
import { printSuccessLine, printWarnLine } from "../output";
import type { CommandContext } from "./common";
import { formatCounters, openPipeline } from "./common";

export interface RunCommandOptions extends PipelineOptionInput {
  limit?: number;
}

export interface RunPayload {
  ok: true;
  run_id: string;
  outcome: RunReport["outcome"];
  dry_run: boolean;
  storage: "upstash" | "memory";
  stats: RunReport["stats"];
  report_path: string;
}

function summaryLines(report: RunReport): string[] {
  const lines: string[] = [];
  if (report.outcome === "completed") {
    lines.push(printSuccessLine(`Run ${report.runId} completed`));
  } else if (report.outcome === "cancelled") {
    lines.push(printWarnLine(`Run ${report.runId} cancelled`));
  } else {
    lines.push(printWarnLine(`Run ${report.runId} stopped on error: ${report.error}`));
  }
  lines.push(`Candidates: ${report.stats.total_candidates}, processed: ${report.stats.processed}`);
  lines.push(`Articles: ${formatCounters(report.stats)}`);
  lines.push(`Report: ${report.reportPath}`);
  return lines;
}

export async function executeRunCommand(
  options: RunCommandOptions,
  context: CommandContext = {},
): Promise<CommandResult<RunPayload>> {
  const pipeline = await openPipeline(options, context);
  const limit = options.limit ?? pipeline.settings.articlesLimit;
  const report = await pipeline.orchestrator.run(limit, { signal: context.signal });

  if (report.outcome === "errored") {
    throw new CliError(5, `pipeline run failed: ${report.error}`, { details: report });
  }

  return {
    payload: {
      ok: true,
      run_id: report.runId,
      outcome: report.outcome,
      dry_run: pipeline.settings.dryRun,
      storage: pipeline.storage,
      stats: report.stats,
      report_path: report.reportPath,
    },
    lines: summaryLines(report),
  };
}
