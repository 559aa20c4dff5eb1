import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { DistanceMetric } from "../config/engine-config.js";
import { logStoreLoad, logStoreMissing, logStoreSave } from "../shared/engine-logger.js";
import { IndexCorruptionError, errorMessage } from "../shared/errors.js";
import { contentHash } from "../shared/hash.js";
import { writeJsonFileAtomic } from "../shared/io.js";
import { isLocator } from "../sources/locator.js";
import type { IndexedChunkRecord, IndexSnapshot } from "./types.js";
import { VectorIndex } from "./vector-index.js";

const STORE_VERSION = 1;
const MANIFEST_FILE = "manifest.json";
const SESSIONS_DIR = "sessions";

interface ManifestSession {
  sessionId: string;
  file: string;
  chunkCount: number;
}

interface IndexManifest {
  version: number;
  metric: DistanceMetric;
  dimensions: number | null;
  model: string | null;
  sessions: ManifestSession[];
  savedAt: string;
}

interface SessionPartition {
  version: number;
  sessionId: string;
  chunks: IndexedChunkRecord[];
}

export interface IndexStoreOptions {
  dataDir: string;
}

export interface LoadIndexOptions {
  /** Restrict loading to these source sessions. */
  sessions?: readonly string[];
}

/**
 * Persists a VectorIndex as a manifest plus one JSON partition per source
 * session. Partitions are written before the manifest, each atomically, so a
 * crash mid-save leaves the previous manifest pointing at complete files.
 * Saves run one at a time, in call order, each writing the index as it is
 * when that save starts.
 */
export class IndexStore {
  readonly dataDir: string;
  private saveTail: Promise<void> = Promise.resolve();

  constructor(options: IndexStoreOptions) {
    this.dataDir = options.dataDir;
  }

  get manifestPath(): string {
    return resolve(this.dataDir, MANIFEST_FILE);
  }

  exists(): boolean {
    return existsSync(this.manifestPath);
  }

  save(index: VectorIndex): Promise<void> {
    const run = this.saveTail.then(() => this.writeSnapshot(index));
    this.saveTail = run.catch(() => undefined);
    return run;
  }

  private async writeSnapshot(index: VectorIndex): Promise<void> {
    const snapshot = index.snapshot();
    const bySession = new Map<string, IndexedChunkRecord[]>();
    for (const record of snapshot.chunks) {
      const bucket = bySession.get(record.sessionId) ?? [];
      bucket.push(record);
      bySession.set(record.sessionId, bucket);
    }

    const sessions: ManifestSession[] = [];
    const sessionIds = [...bySession.keys()].sort();
    for (const sessionId of sessionIds) {
      const chunks = bySession.get(sessionId) ?? [];
      const file = `${SESSIONS_DIR}/${partitionFileName(sessionId)}`;
      const partition: SessionPartition = { version: STORE_VERSION, sessionId, chunks };
      await writeJsonFileAtomic(resolve(this.dataDir, file), partition);
      sessions.push({ sessionId, file, chunkCount: chunks.length });
    }

    const manifest: IndexManifest = {
      version: STORE_VERSION,
      metric: snapshot.metric,
      dimensions: snapshot.dimensions,
      model: snapshot.model,
      sessions,
      savedAt: new Date().toISOString(),
    };
    await writeJsonFileAtomic(this.manifestPath, manifest);
    logStoreSave(this.dataDir, sessions.length, snapshot.chunks.length);
  }

  /**
   * Rebuilds the index from disk. Returns null when nothing was persisted.
   * Throws IndexCorruptionError when a manifest or partition cannot be read back.
   */
  async load(options?: LoadIndexOptions): Promise<VectorIndex | null> {
    if (!this.exists()) {
      logStoreMissing(this.dataDir);
      return null;
    }

    const manifest = await this.readJson(this.manifestPath);
    if (!isIndexManifest(manifest)) {
      throw new IndexCorruptionError("Index manifest has an unexpected shape", this.manifestPath);
    }

    const wanted = options?.sessions ? new Set(options.sessions) : null;
    const chunks: IndexedChunkRecord[] = [];
    let loadedSessions = 0;

    for (const session of manifest.sessions) {
      if (wanted && !wanted.has(session.sessionId)) continue;

      const filePath = resolve(this.dataDir, session.file);
      const partition = await this.readJson(filePath);
      if (!isSessionPartition(partition) || partition.sessionId !== session.sessionId) {
        throw new IndexCorruptionError(`Index partition for session '${session.sessionId}' has an unexpected shape`, filePath);
      }
      for (const record of partition.chunks) {
        if (manifest.dimensions !== null && record.embedding.length !== manifest.dimensions) {
          throw new IndexCorruptionError(
            `Chunk ${record.id} has ${record.embedding.length} dimensions, manifest says ${manifest.dimensions}`,
            filePath,
          );
        }
        chunks.push(record);
      }
      loadedSessions++;
    }

    const snapshot: IndexSnapshot = {
      metric: manifest.metric,
      dimensions: manifest.dimensions,
      model: manifest.model,
      chunks,
    };
    logStoreLoad(this.dataDir, loadedSessions, chunks.length);
    return VectorIndex.fromSnapshot(snapshot);
  }

  private async readJson(filePath: string): Promise<unknown> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (err) {
      throw new IndexCorruptionError(`Index file unreadable: ${errorMessage(err)}`, filePath, { cause: err });
    }

    try {
      return JSON.parse(raw) as unknown;
    } catch (err) {
      throw new IndexCorruptionError(`Index file is not valid JSON: ${errorMessage(err)}`, filePath, { cause: err });
    }
  }
}

function partitionFileName(sessionId: string): string {
  const slug = sessionId.toLowerCase().replace(/[^a-z0-9_-]+/g, "-").replace(/^-+|-+$/g, "").slice(0, 48);
  return `${slug || "session"}-${contentHash(sessionId).slice(0, 8)}.json`;
}

function isIndexManifest(value: unknown): value is IndexManifest {
  if (!value || typeof value !== "object") {
    return false;
  }

  const row = value as Record<string, unknown>;
  return (
    row["version"] === STORE_VERSION &&
    (row["metric"] === "cosine" || row["metric"] === "l2") &&
    (row["dimensions"] === null || typeof row["dimensions"] === "number") &&
    (row["model"] === null || typeof row["model"] === "string") &&
    Array.isArray(row["sessions"]) &&
    row["sessions"].every(isManifestSession)
  );
}

function isManifestSession(value: unknown): value is ManifestSession {
  if (!value || typeof value !== "object") {
    return false;
  }

  const row = value as Record<string, unknown>;
  return (
    typeof row["sessionId"] === "string" &&
    typeof row["file"] === "string" &&
    typeof row["chunkCount"] === "number"
  );
}

function isSessionPartition(value: unknown): value is SessionPartition {
  if (!value || typeof value !== "object") {
    return false;
  }

  const row = value as Record<string, unknown>;
  return (
    row["version"] === STORE_VERSION &&
    typeof row["sessionId"] === "string" &&
    Array.isArray(row["chunks"]) &&
    row["chunks"].every(isIndexedChunkRecord)
  );
}

function isIndexedChunkRecord(value: unknown): value is IndexedChunkRecord {
  if (!value || typeof value !== "object") {
    return false;
  }

  const row = value as Record<string, unknown>;
  const embedding = row["embedding"];
  return (
    typeof row["id"] === "string" &&
    typeof row["text"] === "string" &&
    typeof row["sessionId"] === "string" &&
    isLocator(row["locator"]) &&
    Array.isArray(embedding) &&
    embedding.length > 0 &&
    embedding.every((entry) => typeof entry === "number" && Number.isFinite(entry))
  );
}
