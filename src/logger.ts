import pino from "pino";

export const logger = pino({
  name: "club-bot",
  level: process.env.LOG_LEVEL ?? "info",
});
