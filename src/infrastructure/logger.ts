import { pino } from "pino";
import { config, isDev } from "../config/index.js";

const devTransport = {
  target: "pino-pretty",
  options: {
    translateTime: "HH:MM:ss Z",
    ignore: "pid,hostname,service",
    colorize: true,
  },
};

export const logger = pino({
  level: config.LOG_LEVEL,
  base: { pid: process.pid, service: config.SERVICE_NAME },
  // Room and user routes authenticate with bearer credentials
  redact: {
    paths: ["req.headers.authorization", "credential", "token"],
    censor: "[redacted]",
  },
  ...(isDev && { transport: devTransport }),
});

export type Logger = typeof logger;
