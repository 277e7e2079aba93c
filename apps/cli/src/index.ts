#!/usr/bin/env node
import { Command } from "commander";
import { AGENTMORPH_VERSION } from "@agentmorph/shared";
import { convertCommand } from "./commands/convert.js";
import { detectCommand } from "./commands/detect.js";
import { validateCommand } from "./commands/validate.js";
import { formatsCommand } from "./commands/formats.js";

const program = new Command();

program
  .name("agentmorph")
  .description("agentmorph — convert agent definitions between Claude, Roo and custom formats")
  .version(AGENTMORPH_VERSION);

program
  .command("convert <file>")
  .description("Convert an agent definition file to another agent format")
  .option("--to <format>", "Target agent format (claude | roo | custom)")
  .option("--from <format>", "Source file or agent format (default: from the file extension)")
  .option("-o, --output <file>", "Write the result to a file instead of stdout")
  .option("--format <format>", "Output syntax (json | yaml)")
  .option("--json", "Output as JSON")
  .action(convertCommand);

program
  .command("detect <file>")
  .description("Detect the file format and agent format of a file")
  .option("--json", "Output as JSON")
  .action(detectCommand);

program
  .command("validate <file>")
  .description("Validate a file against an agent format and list every error")
  .option("--dialect <format>", "Agent format to validate against (default: detected)")
  .option("--from <format>", "Source file format (default: detected)")
  .option("--json", "Output as JSON")
  .action(validateCommand);

program
  .command("formats")
  .description("List supported agent and file formats")
  .option("--json", "Output as JSON")
  .action(formatsCommand);

await program.parseAsync();
