import { parse as parseYaml } from "yaml";
import { err, errorMessage, ParseError } from "../errors.js";
import type { ContainerReader } from "./types.js";
import { toContainerTree } from "./types.js";

export const yamlReader: ContainerReader = {
  format: "yaml",
  humanName: "YAML",
  description: "YAML file format",

  read(text) {
    let value: unknown;
    try {
      value = parseYaml(text);
    } catch (e) {
      return err(new ParseError(`Invalid YAML: ${errorMessage(e)}`, { cause: e }));
    }
    return toContainerTree(value, "YAML");
  },
};
