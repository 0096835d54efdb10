/**
 * JSON arguments: inline text, or "@path" to read a file.
 */

import { readFile } from "node:fs/promises";

export async function readJsonFile(path: string): Promise<unknown> {
  const raw = await readFile(path, "utf-8");
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err) {
    throw new Error(`${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export async function readJsonArg(arg: string): Promise<unknown> {
  if (arg.startsWith("@")) return readJsonFile(arg.slice(1));
  try {
    const parsed: unknown = JSON.parse(arg);
    return parsed;
  } catch (err) {
    throw new Error(`not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}
