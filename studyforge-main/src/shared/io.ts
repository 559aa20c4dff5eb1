import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { logFileSkipped } from "./engine-logger.js";

export async function readTextFile(filePath: string, label: string): Promise<string | undefined> {
  try {
    return await readFile(filePath, "utf-8");
  } catch {
    logFileSkipped(label, "not found or unreadable");
    return undefined;
  }
}

export async function writeJsonFileAtomic(filePath: string, data: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;
  await writeFile(tmpPath, JSON.stringify(data, null, 2) + "\n", "utf-8");
  await rename(tmpPath, filePath);
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, "utf-8");
}
