import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { KnowledgeEntry } from "./knowledge-store.js";
import { logger } from "./logger.js";

export interface KnowledgePersistence {
  load(): Promise<KnowledgeEntry[]>;
  save(entries: KnowledgeEntry[]): Promise<void>;
}

const StoredEntrySchema = z.object({
  key: z.string().min(1),
  value: z.unknown(),
  version: z.number().int().positive(),
  writerId: z.string(),
  writtenAt: z.string()
});

const StoredKnowledgeFileSchema = z.object({
  version: z.literal(1),
  updatedAt: z.string(),
  entries: z.array(StoredEntrySchema)
});

type StoredKnowledgeFile = z.infer<typeof StoredKnowledgeFileSchema>;

export class KnowledgeFileStore implements KnowledgePersistence {
  constructor(private readonly filePath: string) {}

  async load(): Promise<KnowledgeEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch {
      return [];
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn({ error, filePath: this.filePath }, "knowledge file is not valid JSON");
      return [];
    }

    const parsed = StoredKnowledgeFileSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn({ filePath: this.filePath, issues: parsed.error.issues.length }, "ignoring malformed knowledge file");
      return [];
    }

    return parsed.data.entries.map((entry) => ({
      key: entry.key,
      value: entry.value,
      version: entry.version,
      writerId: entry.writerId,
      writtenAt: entry.writtenAt
    }));
  }

  async save(entries: KnowledgeEntry[]): Promise<void> {
    const payload: StoredKnowledgeFile = {
      version: 1,
      updatedAt: new Date().toISOString(),
      entries: [...entries]
    };

    const tempPath = `${this.filePath}.tmp`;
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(tempPath, JSON.stringify(payload, null, 2), "utf8");
    await rename(tempPath, this.filePath);
  }
}
