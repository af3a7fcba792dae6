import { appendFile, mkdir, readFile } from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { dirname } from "node:path";
import { z } from "zod";
import { logger } from "./logger.js";

export interface AuditEventInput {
  eventType: string;
  actor: string;
  traceId?: string;
  payload?: Record<string, unknown>;
}

export interface AuditEventRecord {
  id: string;
  timestamp: string;
  eventType: string;
  actor: string;
  traceId: string | null;
  payload: Record<string, unknown>;
}

export interface AuditSink {
  record(event: AuditEventInput): Promise<void>;
}

const AuditRecordSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  eventType: z.string(),
  actor: z.string(),
  traceId: z.string().nullable().default(null),
  payload: z.record(z.unknown()).default({})
});

type AuditSubscriber = (record: AuditEventRecord) => void;

export class NoopAuditSink implements AuditSink {
  async record(): Promise<void> {
    return Promise.resolve();
  }
}

interface FileAuditSinkOptions {
  now?: () => Date;
}

/**
 * Appends coordination events to a newline-delimited JSON journal. Writes are
 * chained so records land in the order `record` was called.
 */
export class FileAuditSink implements AuditSink {
  private readonly now: () => Date;
  private readonly subscribers = new Set<AuditSubscriber>();
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    options?: FileAuditSinkOptions
  ) {
    this.now = options?.now ?? (() => new Date());
  }

  async record(event: AuditEventInput): Promise<void> {
    const record: AuditEventRecord = {
      id: randomUUID(),
      timestamp: this.now().toISOString(),
      eventType: event.eventType,
      actor: event.actor,
      traceId: event.traceId ?? null,
      payload: event.payload ?? {}
    };

    const operation = this.writeQueue.then(async () => {
      try {
        await mkdir(dirname(this.filePath), { recursive: true });
        await appendFile(this.filePath, `${JSON.stringify(record)}\n`, {
          encoding: "utf8"
        });
        this.broadcast(record);
      } catch (error) {
        logger.error({ error, filePath: this.filePath }, "failed to append audit event");
      }
    });

    this.writeQueue = operation.catch(() => undefined);
    await operation;
  }

  subscribe(listener: AuditSubscriber): () => void {
    this.subscribers.add(listener);
    return () => {
      this.subscribers.delete(listener);
    };
  }

  async getRecent(limit = 100): Promise<AuditEventRecord[]> {
    const cappedLimit = Math.max(1, Math.min(limit, 500));
    await this.writeQueue;

    let content: string;
    try {
      content = await readFile(this.filePath, "utf8");
    } catch {
      return [];
    }

    const rows = content
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    const records: AuditEventRecord[] = [];
    for (let index = rows.length - 1; index >= 0 && records.length < cappedLimit; index -= 1) {
      const parsed = parseRecord(rows[index]);
      if (parsed) {
        records.push(parsed);
      }
    }

    return records;
  }

  private broadcast(record: AuditEventRecord): void {
    for (const subscriber of this.subscribers) {
      try {
        subscriber(record);
      } catch (error) {
        logger.error({ error }, "audit subscriber failed");
      }
    }
  }
}

function parseRecord(line: string): AuditEventRecord | null {
  try {
    const parsed = AuditRecordSchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    logger.warn({ error }, "skipping unreadable audit row");
    return null;
  }
}
