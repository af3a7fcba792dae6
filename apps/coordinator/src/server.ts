import type { Server } from "node:http";
import { FileAuditSink } from "./audit.js";
import { loadConfigFromEnv } from "./config.js";
import { Coordinator } from "./coordinator.js";
import { createCoordinatorApp } from "./http.js";
import { KnowledgeFileStore } from "./knowledge-file-store.js";
import { logger } from "./logger.js";

const PORT = Number(process.env.PORT ?? 3001);
const AUDIT_LOG_FILE = process.env.AUDIT_LOG_FILE ?? "data/audit/events.jsonl";
const KNOWLEDGE_FILE_PATH = process.env.KNOWLEDGE_FILE_PATH ?? "data/knowledge/knowledge.json";

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function bootstrap(): Promise<void> {
  const config = loadConfigFromEnv();
  const audit = new FileAuditSink(AUDIT_LOG_FILE);
  const coordinator = new Coordinator(config, {
    audit,
    persistence: new KnowledgeFileStore(KNOWLEDGE_FILE_PATH)
  });

  await coordinator.start();
  const app = createCoordinatorApp(coordinator);

  app.get("/audit/recent", async (req, res) => {
    const rawLimit = Number(req.query.limit ?? 100);
    const limit = Number.isNaN(rawLimit) ? 100 : rawLimit;
    const records = await audit.getRecent(limit);
    res.json({ records });
  });

  const server = app.listen(PORT, () => {
    logger.info(
      { port: PORT, auditLogFile: AUDIT_LOG_FILE, knowledgeFilePath: KNOWLEDGE_FILE_PATH },
      "coordinator listening"
    );
  });

  let stopping = false;
  const stop = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info({ signal }, "shutdown requested");
    await coordinator.shutdown();
    await closeServer(server);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      stop(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ error }, "shutdown failed");
          process.exit(1);
        }
      );
    });
  }
}

bootstrap().catch((error: unknown) => {
  logger.error({ error }, "coordinator bootstrap failed");
  process.exit(1);
});
