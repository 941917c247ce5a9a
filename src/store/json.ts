import fs from "node:fs/promises";
import { writeFileAtomic } from "./fs.js";

export async function writeJsonFile(filePath: string, doc: unknown): Promise<void> {
  await writeFileAtomic(filePath, `${JSON.stringify(doc, null, 2)}\n`);
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const s = await fs.readFile(filePath, { encoding: "utf8" });
  return JSON.parse(s);
}
