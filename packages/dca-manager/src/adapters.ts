// Default adapters
import type { Clock, Logger } from "./types";

export const consoleLogger: Logger = {
  info: (msg, meta) => console.log("[INFO]", msg, meta ?? ""),
  warn: (msg, meta) => console.warn("[WARN]", msg, meta ?? ""),
  error: (msg, meta) => console.error("[ERROR]", msg, meta ?? ""),
};

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
