import { listSupportedFormats } from "@agentmorph/core";
import { displayFormats } from "../utils/display.js";
import { isJsonMode, outputResult } from "../utils/output.js";

export function formatsCommand(): void {
  const formats = Object.values(listSupportedFormats());

  if (isJsonMode()) {
    outputResult({ formats });
    return;
  }
  displayFormats(formats);
}
