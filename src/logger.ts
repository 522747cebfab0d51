import pino from "pino";

// stdout carries the timeline and the MCP transport, so logs go to stderr.
const pretty =
  process.env.NODE_ENV !== "production" &&
  process.env.NODE_ENV !== "test" &&
  process.stderr.isTTY === true;

export const logger = pretty
  ? pino({
      level: process.env.LOG_LEVEL ?? "info",
      transport: {
        target: "pino-pretty",
        options: { translateTime: "SYS:standard", destination: 2, ignore: "pid,hostname" },
      },
    })
  : pino({ level: process.env.LOG_LEVEL ?? "info" }, pino.destination(2));

export type Logger = typeof logger;
