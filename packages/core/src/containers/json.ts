import { err, errorMessage, ParseError } from "../errors.js";
import type { ContainerReader } from "./types.js";
import { toContainerTree } from "./types.js";

export const jsonReader: ContainerReader = {
  format: "json",
  humanName: "JSON",
  description: "JSON file format",

  read(text) {
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (e) {
      return err(new ParseError(`Invalid JSON: ${errorMessage(e)}`, { cause: e }));
    }
    return toContainerTree(value, "JSON");
  },
};
