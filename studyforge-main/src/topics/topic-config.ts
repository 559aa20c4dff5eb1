import { ConfigError } from "../shared/errors.js";
import { readTextFile } from "../shared/io.js";
import type { Topic } from "./types.js";

export function slugifyTopicName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, "_");
}

/**
 * Validates raw topic configuration (an array, or `{ topics: [...] }`) into
 * frozen Topic objects. Missing ids derive from the name; keywords are
 * trimmed and de-duplicated case-insensitively.
 */
export function normalizeTopics(raw: unknown): Topic[] {
  const list = topicList(raw);
  if (!list) {
    throw new ConfigError("Topics must be an array or an object with a 'topics' array", "topics");
  }

  const seenIds = new Set<string>();
  return list.map((entry, position) => {
    const field = `topics[${position}]`;
    if (!entry || typeof entry !== "object" || Array.isArray(entry)) {
      throw new ConfigError(`${field} must be an object`, field);
    }
    const value = entry as Record<string, unknown>;

    const name = typeof value["name"] === "string" ? value["name"].trim() : "";
    if (name.length === 0) {
      throw new ConfigError(`${field}.name must be a non-empty string`, `${field}.name`);
    }

    const rawId = value["id"];
    if (rawId !== undefined && (typeof rawId !== "string" || rawId.trim().length === 0)) {
      throw new ConfigError(`${field}.id must be a non-empty string`, `${field}.id`);
    }
    const id = typeof rawId === "string" ? rawId.trim() : slugifyTopicName(name);
    if (seenIds.has(id)) {
      throw new ConfigError(`Duplicate topic id: ${id}`, `${field}.id`);
    }
    seenIds.add(id);

    const rawKeywords = value["keywords"] ?? [];
    if (!Array.isArray(rawKeywords) || !rawKeywords.every((keyword) => typeof keyword === "string")) {
      throw new ConfigError(`${field}.keywords must be an array of strings`, `${field}.keywords`);
    }
    const keywords = dedupeKeywords(rawKeywords);

    const required = value["required"] ?? false;
    if (typeof required !== "boolean") {
      throw new ConfigError(`${field}.required must be a boolean`, `${field}.required`);
    }

    const weight = value["weight"] ?? 1;
    if (typeof weight !== "number" || !Number.isFinite(weight) || weight < 0) {
      throw new ConfigError(`${field}.weight must be a non-negative number`, `${field}.weight`);
    }

    const description = typeof value["description"] === "string" && value["description"].trim().length > 0
      ? value["description"].trim()
      : undefined;

    const topic: Topic = {
      id,
      name,
      keywords: Object.freeze(keywords),
      required,
      weight,
      ...(description ? { description } : {}),
    };
    return Object.freeze(topic);
  });
}

export async function loadTopicsFile(filePath: string): Promise<Topic[]> {
  const raw = await readTextFile(filePath, filePath);
  if (raw === undefined) {
    throw new ConfigError(`Topics file not found: ${filePath}`, "topics");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Topics file has invalid JSON: ${filePath}`, "topics");
  }
  return normalizeTopics(parsed);
}

function topicList(raw: unknown): unknown[] | null {
  if (Array.isArray(raw)) return raw;
  if (!raw || typeof raw !== "object") return null;
  const nested = (raw as Record<string, unknown>)["topics"];
  return Array.isArray(nested) ? nested : null;
}

function dedupeKeywords(keywords: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const keyword of keywords) {
    const clean = keyword.trim();
    const key = clean.toLowerCase();
    if (clean.length === 0 || seen.has(key)) continue;
    seen.add(key);
    out.push(clean);
  }
  return out;
}
