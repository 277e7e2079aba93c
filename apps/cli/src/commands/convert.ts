import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import chalk from "chalk";
import { OUTPUT_FORMATS } from "@agentmorph/shared";
import type { OutputFormat } from "@agentmorph/shared";
import { convertFile, detectContainerFormat, errorMessage } from "@agentmorph/core";
import { loadConfig } from "../utils/config.js";
import { displayIgnoredConfig, displayWarnings } from "../utils/display.js";
import { EXIT, isJsonMode, logSuccess, outputError, outputPipelineError, outputResult } from "../utils/output.js";
import { renderTree } from "../utils/render.js";

export interface ConvertCommandOptions {
  to?: string;
  from?: string;
  output?: string;
  format?: string;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export async function convertCommand(file: string, options: ConvertCommandOptions): Promise<void> {
  const { config, ignored } = loadConfig();
  displayIgnoredConfig(ignored);

  const target = options.to ?? config.default_target;
  if (!target) {
    outputError("INPUT_INVALID", "No target format given", {
      exitCode: EXIT.INPUT_INVALID,
      hints: ["Pass --to <format> or set default_target in .agentmorphrc"],
    });
    return;
  }

  const format = options.format ?? config.output_format;
  if (!isOutputFormat(format)) {
    outputError("INPUT_INVALID", `Invalid output format: ${format}`, {
      exitCode: EXIT.INPUT_INVALID,
      hints: [`Valid output formats: ${OUTPUT_FORMATS.join(", ")}`],
    });
    return;
  }

  const source = options.from ?? detectContainerFormat(file);
  if (source === "unknown") {
    outputError("INPUT_INVALID", `Cannot tell the file format of ${file} from its extension`, {
      exitCode: EXIT.INPUT_INVALID,
      hints: ["Pass --from <format>"],
    });
    return;
  }

  const result = await convertFile(resolve(file), source, target);
  if (!result.ok) {
    outputPipelineError(result.error);
    return;
  }

  const { targetTree, warnings, sourceDialect, targetDialect } = result.value;
  const rendered = renderTree(targetTree, format, config.indent);

  if (options.output) {
    try {
      await writeFile(options.output, rendered, "utf-8");
    } catch (e) {
      outputError("IO_ERROR", `Failed to write ${options.output}: ${errorMessage(e)}`, {
        exitCode: EXIT.IO_FAILED,
      });
      return;
    }
  }

  if (isJsonMode()) {
    outputResult({
      source_format: source,
      source_dialect: sourceDialect,
      target_dialect: targetDialect,
      output_path: options.output ?? null,
      warnings,
      document: targetTree,
    });
    return;
  }

  displayWarnings(warnings);
  if (options.output) {
    logSuccess(chalk.green(`Converted ${sourceDialect} → ${targetDialect}: ${options.output}`));
  } else {
    process.stdout.write(rendered);
  }
}
