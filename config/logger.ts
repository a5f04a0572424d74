import pino from "pino";

const isDev = process.env.NODE_ENV !== "production";

export const logger = pino({
  name: "cadence",
  transport: isDev
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname,name",
          singleLine: true,
        },
      }
    : undefined,
  level: process.env.CADENCE_LOG_LEVEL ?? process.env.LOG_LEVEL ?? "info",
});
