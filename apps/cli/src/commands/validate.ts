import { resolve } from "node:path";
import chalk from "chalk";
import {
  detectContainerFormat,
  detectDialect,
  getContainerReader,
  getParser,
  liftMarkdownTree,
  readSourceFile,
} from "@agentmorph/core";
import { displayErrors } from "../utils/display.js";
import { EXIT, isJsonMode, outputError, outputPipelineError, outputResult } from "../utils/output.js";

export interface ValidateCommandOptions {
  dialect?: string;
  from?: string;
}

export async function validateCommand(file: string, options: ValidateCommandOptions): Promise<void> {
  const content = await readSourceFile(resolve(file));
  if (!content.ok) {
    outputPipelineError(content.error);
    return;
  }

  const container = options.from ?? detectContainerFormat(file, content.value);
  if (container === "unknown") {
    outputError("INPUT_INVALID", `Cannot tell the file format of ${file}`, {
      exitCode: EXIT.INPUT_INVALID,
      hints: ["Pass --from <format>"],
    });
    return;
  }

  const reader = getContainerReader(container);
  if (!reader.ok) {
    outputPipelineError(reader.error);
    return;
  }

  const dialect = options.dialect ?? detectDialect(content.value);
  const parser = getParser(dialect);
  if (!parser.ok) {
    outputPipelineError(parser.error);
    return;
  }

  const read = reader.value.read(content.value);
  if (!read.ok) {
    outputPipelineError(read.error);
    return;
  }

  const tree = reader.value.format === "markdown" ? liftMarkdownTree(read.value).tree : read.value;
  const report = parser.value.validate(tree);

  if (!report.valid) {
    if (!isJsonMode()) {
      console.log(chalk.red.bold(`INVALID ${parser.value.humanName} agent`));
      displayErrors(report.errors);
    }
    outputError("VALIDATION_FAILED", `${file} is not a valid ${dialect} agent`, {
      exitCode: EXIT.VALIDATION_FAILED,
      hints: isJsonMode() ? report.errors : [],
    });
    return;
  }

  if (isJsonMode()) {
    outputResult({ file, dialect, valid: true, errors: [] });
    return;
  }
  console.log(chalk.green.bold(`VALID ${parser.value.humanName} agent`));
}
