import { pino } from "pino";

export const logger = pino({
  name: "agent-mesh",
  level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info")
});
