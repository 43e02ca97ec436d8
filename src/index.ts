#!/usr/bin/env node
import { config as loadEnv } from "dotenv";
import pino from "pino";

import { runCli } from "./cli";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

const isDev = process.env.NODE_ENV !== "production";

const log = pino({
  name: "readiness-gate",
  level: process.env.LOG_LEVEL ?? "info",
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(isDev && process.env.PINO_PRETTY === "1"
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
      }
    : {}),
});

runCli({ env: process.env, argv: process.argv.slice(2), log })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    log.error({ evt: "gate.fatal", error: String(err?.message ?? err) }, "gate.fatal");
    process.exitCode = 1;
  });
