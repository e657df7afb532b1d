import type { Logger } from "@/lib/infra/logger";
import type { Pipeline } from "@/lib/pipeline/build-pipeline";
import { buildPipeline } from "@/lib/pipeline/build-pipeline";
import type { PipelineOptionInput } from "../config";
import { asCliError, resolveCliSettings } from "../config";

export interface CommandContext {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  signal?: AbortSignal;
}

export async function openPipeline(options: PipelineOptionInput, context: CommandContext): Promise<Pipeline> {
  const env = context.env ?? process.env;
  try {
    return await buildPipeline({
      env,
      settings: resolveCliSettings(options, env),
      logger: context.logger,
    });
  } catch (error) {
    throw asCliError(error);
  }
}

export function formatCounters(stats: {
  created: number;
  skipped: number;
  failed: number;
}): string {
  return `created ${stats.created} / skipped ${stats.skipped} / failed ${stats.failed}`;
}
