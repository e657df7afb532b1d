import pc from "picocolors";

export interface CommandResult<T = unknown> {
  payload: T;
  lines?: string[];
}

export function printCommandResult(result: CommandResult, jsonMode: boolean): void {
  if (jsonMode) {
    process.stdout.write(`${JSON.stringify(result.payload, null, 2)}\n`);
    return;
  }
  for (const line of result.lines || []) {
    process.stdout.write(`${line}\n`);
  }
}

export function printSuccessLine(text: string): string {
  return `${pc.green("✔")} ${text}`;
}

export function printWarnLine(text: string): string {
  return `${pc.yellow("!")} ${text}`;
}
