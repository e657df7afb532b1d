import type { MonitorState, RunState } from "@/lib/domain/models";
import { openStateFiles } from "@/lib/pipeline/build-pipeline";
import type { PipelineOptionInput } from "../config";
import { resolveCliSettings } from "../config";
import type { CommandResult } from "../output";
import { printSuccessLine, printWarnLine } from "../output";
import type { CommandContext } from "./common";
import { formatCounters } from "./common";

export interface StatusPayload {
  ok: true;
  run: RunState | null;
  monitor: MonitorState | null;
}

function runLines(run: RunState | null): string[] {
  if (!run) {
    return [printWarnLine("Last run: no data")];
  }
  const lines = [
    printSuccessLine(`Last run ${run.run_id}: ${run.status} (step: ${run.current_step})`),
    `  Started: ${run.started_at}${run.completed_at ? `, completed: ${run.completed_at}` : ""}`,
    `  Progress: ${run.processed}/${run.total_candidates}, ${formatCounters(run)}`,
  ];
  if (run.current_article) {
    const article = run.current_article;
    lines.push(`  Current: [${article.index}/${article.total}] ${article.title}`);
  }
  const lastMessage = run.messages.at(-1);
  if (lastMessage) {
    lines.push(`  Last message: [${lastMessage.step}] ${lastMessage.message}`);
  }
  return lines;
}

function monitorLines(monitor: MonitorState | null): string[] {
  if (!monitor) {
    return [printWarnLine("Monitor: no data")];
  }
  const head = monitor.running
    ? printSuccessLine(`Monitor running (every ${monitor.poll_interval_seconds}s)`)
    : printWarnLine("Monitor stopped");
  const lines = [
    head,
    `  Checks: ${monitor.total_checks}, last: ${monitor.last_check ?? "never"}`,
    `  Articles: found ${monitor.total_articles_found}, processed ${monitor.total_articles_processed}, created ${monitor.total_articles_created}`,
  ];
  for (const article of monitor.last_articles) {
    lines.push(`  - [${article.status}] ${article.title} (${article.source})`);
  }
  return lines;
}

export async function executeStatusCommand(
  options: PipelineOptionInput,
  context: CommandContext = {},
): Promise<CommandResult<StatusPayload>> {
  const settings = resolveCliSettings(options, context.env ?? process.env);
  const files = openStateFiles(settings.dataDir);
  const [run, monitor] = await Promise.all([files.run.read(), files.monitor.read()]);

  return {
    payload: { ok: true, run, monitor },
    lines: [...runLines(run), ...monitorLines(monitor)],
  };
}
