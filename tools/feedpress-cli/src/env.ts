import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadDotenv } from "dotenv";

function candidateEnvFiles(): string[] {
  const cwd = process.cwd();
  const byCwd = [resolve(cwd, ".env"), resolve(cwd, "../.env"), resolve(cwd, "../../.env")];

  const moduleDir = dirname(fileURLToPath(import.meta.url));
  const byModule = [resolve(moduleDir, "../.env"), resolve(moduleDir, "../../.env"), resolve(moduleDir, "../../../.env")];

  return Array.from(new Set([...byCwd, ...byModule]));
}

export function bootstrapEnvFromDotenv(): void {
  for (const filePath of candidateEnvFiles()) {
    if (!existsSync(filePath)) {
      continue;
    }
    loadDotenv({
      path: filePath,
      override: false,
    });
  }
}
