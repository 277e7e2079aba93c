import { EXIT } from "@agentmorph/shared";
import type { ExitCode } from "@agentmorph/shared";
import { isNotFound } from "@agentmorph/core";
import type { IOError, PipelineError } from "@agentmorph/core";

export { EXIT };

const SCHEMA_VERSION = 1;

// --json detection (global flag)
export function isJsonMode(): boolean {
  return process.argv.includes("--json");
}

// Structured success result → stdout
export function outputResult(data: Record<string, unknown>): void {
  const envelope = { schema_version: SCHEMA_VERSION, ok: true, data };
  process.stdout.write(JSON.stringify(envelope, null, 2) + "\n");
}

// Structured error → stdout (JSON mode) / stderr (normal)
export function outputError(
  code: string,
  message: string,
  opts: {
    exitCode?: ExitCode;
    retryable?: boolean;
    hints?: string[];
  } = {},
): void {
  const { exitCode = EXIT.GENERAL, retryable = false, hints = [] } = opts;
  process.exitCode = exitCode;

  if (isJsonMode()) {
    const envelope = {
      schema_version: SCHEMA_VERSION,
      ok: false,
      error: { code, message, retryable, hints },
    };
    process.stdout.write(JSON.stringify(envelope, null, 2) + "\n");
  } else {
    console.error(message);
    for (const hint of hints) console.error(`  - ${hint}`);
  }
}

export interface ErrorCategory {
  code: string;
  exitCode: ExitCode;
  hints: string[];
}

export function categorize(error: PipelineError | IOError): ErrorCategory {
  switch (error.kind) {
    case "parse":
      return { code: "PARSE_ERROR", exitCode: EXIT.PARSE_FAILED, hints: [] };
    case "validation":
      return { code: "VALIDATION_FAILED", exitCode: EXIT.VALIDATION_FAILED, hints: error.errors };
    case "unsupported_format":
      return { code: "UNSUPPORTED_FORMAT", exitCode: EXIT.UNSUPPORTED_FORMAT, hints: [] };
    case "io":
      return isNotFound(error.cause)
        ? { code: "FILE_NOT_FOUND", exitCode: EXIT.INPUT_INVALID, hints: [] }
        : { code: "IO_ERROR", exitCode: EXIT.IO_FAILED, hints: [] };
  }
}

export function outputPipelineError(error: PipelineError | IOError): void {
  const { code, exitCode, hints } = categorize(error);
  outputError(code, error.message, { exitCode, hints });
}

// Success/warnings → stderr (suppressed in JSON mode to keep stdout clean)
export function logSuccess(msg: string): void {
  if (!isJsonMode()) process.stderr.write(msg + "\n");
}

export function logWarning(msg: string): void {
  if (!isJsonMode()) process.stderr.write(msg + "\n");
}
