import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import Fuse, { type IFuseOptions } from "fuse.js";
import { describeError } from "../errors";
import type { Logger } from "../logging/logger";
import type { IInsightIndex, InsightMetadata, InsightSearchHit } from "../types/contracts";
import { clampInt, isRecord, safeParseJson } from "../utils";

interface IndexedInsight {
  id: string;
  title: string;
  tags: string[];
  transcript: string;
  capsule: string;
  timestamp: string;
  logPath: string;
}

const INSIGHT_FUSE_OPTIONS: IFuseOptions<IndexedInsight> = {
  threshold: 0.4,
  ignoreLocation: true,
  includeScore: true,
  keys: [
    { name: "title", weight: 0.35 },
    { name: "tags", weight: 0.25 },
    { name: "capsule", weight: 0.25 },
    { name: "transcript", weight: 0.15 }
  ]
};

/** Fuzzy insight search persisted as a JSON array. */
export class FuseInsightIndex implements IInsightIndex {
  private fuse: Fuse<IndexedInsight>;

  private constructor(
    private readonly filePath: string,
    private readonly logger: Logger,
    private readonly entries: IndexedInsight[]
  ) {
    this.fuse = new Fuse(entries, INSIGHT_FUSE_OPTIONS);
  }

  static async open(filePath: string, logger: Logger): Promise<FuseInsightIndex> {
    let entries: IndexedInsight[] = [];
    try {
      const raw = await readFile(filePath, "utf-8");
      const parsed = safeParseJson(raw);
      entries = Array.isArray(parsed) ? parsed.filter(isIndexedInsight) : [];
      if (!Array.isArray(parsed)) {
        logger.warn("Insight index file is not a JSON array; starting empty", { path: filePath });
      }
    } catch (error) {
      logger.debug("No insight index loaded", { path: filePath, error: describeError(error) });
    }
    logger.info("Insight index ready", { path: filePath, count: entries.length });
    return new FuseInsightIndex(filePath, logger, entries);
  }

  count(): number {
    return this.entries.length;
  }

  async add(id: string, transcript: string, capsule: string, metadata: InsightMetadata): Promise<boolean> {
    const entry: IndexedInsight = { id, transcript, capsule, ...metadata };
    const existing = this.entries.findIndex((e) => e.id === id);
    if (existing >= 0) {
      this.entries[existing] = entry;
    } else {
      this.entries.push(entry);
    }
    this.fuse = new Fuse(this.entries, INSIGHT_FUSE_OPTIONS);

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, JSON.stringify(this.entries, null, 2), "utf-8");
    } catch (error) {
      this.logger.error("Failed to persist insight index", { id, error: describeError(error) });
      return false;
    }
    this.logger.info("Insight indexed", { id, count: this.entries.length });
    return true;
  }

  async search(query: string, limit: number): Promise<InsightSearchHit[]> {
    const trimmed = query.trim();
    if (!trimmed || this.entries.length === 0) {
      return [];
    }
    return this.fuse
      .search(trimmed)
      .slice(0, clampInt(limit, 1, 50))
      .map(({ item, score }) => ({
        id: item.id,
        text: `${item.transcript}\n\n${item.capsule}`,
        metadata: {
          title: item.title,
          tags: item.tags,
          timestamp: item.timestamp,
          logPath: item.logPath
        },
        score: 1 - (score ?? 1)
      }));
  }
}

function isIndexedInsight(value: unknown): value is IndexedInsight {
  return (
    isRecord(value) &&
    typeof value.id === "string" &&
    typeof value.title === "string" &&
    Array.isArray(value.tags) &&
    value.tags.every((t) => typeof t === "string") &&
    typeof value.transcript === "string" &&
    typeof value.capsule === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.logPath === "string"
  );
}
