import { ConfigError } from "@/lib/domain/errors";
import type { Settings } from "@/lib/settings";
import { resolveSettings } from "@/lib/settings";
import { CliError } from "./errors";

export interface PipelineOptionInput {
  configDir?: string;
  dataDir?: string;
  dryRun?: boolean;
  json?: boolean;
}

function normalizeString(value: unknown): string {
  return String(value ?? "").trim();
}

export function parseBoundedInt(label: string, value: unknown, min: number, max: number): number {
  const text = normalizeString(value);
  const parsed = Number.parseInt(text, 10);
  if (!Number.isFinite(parsed)) {
    throw new CliError(1, `${label} is not a valid integer: ${text}`);
  }
  if (parsed < min || parsed > max) {
    throw new CliError(1, `${label} out of range, expected ${min}-${max}: ${parsed}`);
  }
  return parsed;
}

/** Environment settings with the command-line flags applied on top. */
export function resolveCliSettings(options: PipelineOptionInput, env: NodeJS.ProcessEnv = process.env): Settings {
  const settings = resolveSettings({
    ...env,
    FEEDPRESS_CONFIG_DIR: normalizeString(options.configDir) || env.FEEDPRESS_CONFIG_DIR,
    FEEDPRESS_DATA_DIR: normalizeString(options.dataDir) || env.FEEDPRESS_DATA_DIR,
  });
  if (options.dryRun) {
    settings.dryRun = true;
  }
  return settings;
}

/** Maps configuration failures to exit code 2, leaves everything else alone. */
export function asCliError(error: unknown): unknown {
  if (error instanceof ConfigError) {
    return new CliError(2, error.message, { hint: "check the files in the config directory and the .env settings" });
  }
  return error;
}
