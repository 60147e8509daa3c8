/**
 * Shared winston logger factory
 *
 * Console output is always on; file transports are added when
 * CONTEXT_MEMORY_LOG_DIR points at a writable directory.
 */

import { mkdirSync } from "node:fs";
import { join } from "node:path";
import winston from "winston";

export type Logger = winston.Logger;

const level = process.env.CONTEXT_MEMORY_LOG_LEVEL || "info";
const logsDir = process.env.CONTEXT_MEMORY_LOG_DIR?.trim();

function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [new winston.transports.Console({ level })];
  if (!logsDir) return transports;

  try {
    mkdirSync(logsDir, { recursive: true });
  } catch (err) {
    process.emitWarning(`context-memory: cannot create log dir ${logsDir}: ${err instanceof Error ? err.message : err}`);
    return transports;
  }

  transports.push(
    new winston.transports.File({ filename: join(logsDir, "context-memory-error.log"), level: "error" }),
    new winston.transports.File({ filename: join(logsDir, "context-memory.log"), level: "debug" }),
  );
  return transports;
}

const root = winston.createLogger({
  level: "debug",
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  defaultMeta: { service: "context-memory" },
  transports: buildTransports(),
});

/** Child logger tagged with a component name. */
export function createLogger(component: string): Logger {
  return root.child({ component });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
