export type ExitCode = 1 | 2 | 3 | 4 | 5;

export interface CliErrorOptions {
  hint?: string;
  details?: unknown;
}

export class CliError extends Error {
  readonly code: ExitCode;
  readonly hint?: string;
  readonly details?: unknown;

  constructor(code: ExitCode, message: string, options: CliErrorOptions = {}) {
    super(message);
    this.name = "CliError";
    this.code = code;
    this.hint = options.hint;
    this.details = options.details;
  }

  toJSON() {
    return {
      ok: false,
      error: {
        code: this.code,
        message: this.message,
        hint: this.hint,
        details: this.details,
      },
    };
  }
}
