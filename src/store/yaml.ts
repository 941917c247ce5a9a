import fs from "node:fs/promises";
import YAML from "yaml";
import { errnoCode } from "./fs.js";

/** Missing file reads as `undefined`; a present but unparseable file still throws. */
export async function readOptionalYamlFile(filePath: string): Promise<unknown> {
  let s: string;
  try {
    s = await fs.readFile(filePath, { encoding: "utf8" });
  } catch (e) {
    if (errnoCode(e) === "ENOENT") return undefined;
    throw e;
  }
  return YAML.parse(s);
}
