import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { appendFileDurable, isPidAlive, pathExists, writeFileAtomic } from "../src/store/fs.js";
import { readOptionalYamlFile } from "../src/store/yaml.js";

async function mkTmpDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "puk-"));
}

describe("store fs writes", () => {
  test("writeFileAtomic creates missing parent directories", async () => {
    const dir = await mkTmpDir();
    const filePath = path.join(dir, "nested", "deep", "file.txt");
    await writeFileAtomic(filePath, "hello");
    const content = await fs.readFile(filePath, { encoding: "utf8" });
    expect(content).toBe("hello");
    expect(await fs.readdir(path.dirname(filePath))).toEqual(["file.txt"]);
  });

  test("concurrent appends to one file keep whole lines", async () => {
    const dir = await mkTmpDir();
    const filePath = path.join(dir, "log.ndjson");
    await Promise.all(Array.from({ length: 20 }, (_, i) => appendFileDurable(filePath, `${i}\n`)));
    const lines = (await fs.readFile(filePath, { encoding: "utf8" })).split("\n").filter(Boolean);
    expect(lines.map(Number).sort((a, b) => a - b)).toEqual(Array.from({ length: 20 }, (_, i) => i));
  });

  test("pathExists and isPidAlive", async () => {
    const dir = await mkTmpDir();
    expect(await pathExists(dir)).toBe(true);
    expect(await pathExists(path.join(dir, "missing"))).toBe(false);
    expect(isPidAlive(process.pid)).toBe(true);
    expect(isPidAlive(0)).toBe(false);
    expect(isPidAlive(-5)).toBe(false);
  });

  test("a missing optional yaml file reads as undefined", async () => {
    const dir = await mkTmpDir();
    expect(await readOptionalYamlFile(path.join(dir, "none.yaml"))).toBeUndefined();
    await fs.writeFile(path.join(dir, "a.yaml"), "k: [1, 2]\n");
    expect(await readOptionalYamlFile(path.join(dir, "a.yaml"))).toEqual({ k: [1, 2] });
  });
});
