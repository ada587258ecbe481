/**
 * Process-wide pino logger. `LOG_LEVEL` sets the level; `LOG_FILE`, when
 * set, copies every record to that file next to stdout.
 */

import "dotenv/config";

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type Level } from "pino";

function isLevel(value: string): value is Level {
  return Object.hasOwn(pino.levels.values, value);
}

// "silent" is accepted by pino but is not one of its numbered levels
function readLevel(): Level | "silent" {
  const raw = (process.env.LOG_LEVEL ?? "info").trim().toLowerCase();
  if (raw === "silent" || isLevel(raw)) {
    return raw;
  }
  return "info";
}

const level = readLevel();
const logFile = process.env.LOG_FILE?.trim() ?? "";

function fileTee(path: string): DestinationStream {
  mkdirSync(dirname(path), { recursive: true });
  const streamLevel = level === "silent" ? "fatal" : level;
  return pino.multistream([
    { level: streamLevel, stream: process.stdout },
    { level: streamLevel, stream: pino.destination({ dest: path, sync: false }) },
  ]);
}

const destination = logFile === "" ? undefined : fileTee(logFile);

export const logger =
  destination === undefined ? pino({ level }) : pino({ level }, destination);

/** Handed to `Fastify({ logger })` so request logs share the destination */
export const fastifyLoggerConfig =
  destination === undefined ? { level } : { level, stream: destination };

export const inventoryLogger = logger.child({ module: "inventory" });
export const syncLogger = logger.child({ module: "sync" });
export const cacheLogger = logger.child({ module: "cache" });
export const dnsLogger = logger.child({ module: "dns" });
export const serverLogger = logger.child({ module: "server" });

if (destination !== undefined) {
  logger.info({ logFile, level }, "Writing logs to file");
}
