import chalk from "chalk";
import type { FormatDescriptor } from "@agentmorph/core";
import type { IgnoredConfig } from "./config.js";
import { logWarning } from "./output.js";

export function displayWarnings(warnings: string[]): void {
  if (warnings.length === 0) return;
  logWarning(chalk.bold("Conversion notes:"));
  for (const warning of warnings) {
    logWarning(`  ${chalk.yellow("⚠")} ${warning}`);
  }
}

export function displayErrors(errors: string[]): void {
  for (const error of errors) {
    console.log(`  ${chalk.red("✗")} ${error}`);
  }
}

export function displayIgnoredConfig(ignored: IgnoredConfig[]): void {
  for (const { path, reason } of ignored) {
    logWarning(chalk.yellow(`Ignoring ${path}: ${reason}`));
  }
}

export function displayFormats(formats: FormatDescriptor[]): void {
  const width = Math.max(...formats.map((format) => format.name.length));

  for (const kind of ["agent", "file"] as const) {
    console.log(chalk.bold(kind === "agent" ? "Agent formats:" : "File formats:"));
    for (const format of formats.filter((f) => f.kind === kind)) {
      console.log(`  ${chalk.cyan(format.name.padEnd(width))}  ${format.humanName}`);
      console.log(chalk.dim(`  ${" ".repeat(width)}  ${format.description}`));
    }
    console.log();
  }
}
