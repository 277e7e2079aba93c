import { resolve } from "node:path";
import chalk from "chalk";
import { detectContainerFormat, detectDialect, readSourceFile } from "@agentmorph/core";
import { isJsonMode, outputPipelineError, outputResult } from "../utils/output.js";

export async function detectCommand(file: string): Promise<void> {
  const content = await readSourceFile(resolve(file));
  if (!content.ok) {
    outputPipelineError(content.error);
    return;
  }

  const container = detectContainerFormat(file, content.value);
  const dialect = detectDialect(content.value);

  if (isJsonMode()) {
    outputResult({ file, container, dialect });
    return;
  }

  console.log(`${chalk.bold("File format:")}  ${container}`);
  console.log(`${chalk.bold("Agent format:")} ${dialect}`);
}
