import { readFileSync } from "fs";
import { fileURLToPath } from "url";

/**
 * Read a JSON file from the project's data/ directory.
 * Resolved relative to this module so it works from src/ and dist/ alike.
 */
export function readDataFile(fileName: string): unknown {
  const path = fileURLToPath(new URL(`../../data/${fileName}`, import.meta.url));
  const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
  return parsed;
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === "string");
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
