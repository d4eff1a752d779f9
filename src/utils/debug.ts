// Lightweight, opt-in debug logging utilities for drivers + tests

// Topics can be enabled via the BLOCKFALL_DEBUG environment variable:
// "true", "1", "on" for everything, or a comma list of topics,
// e.g. BLOCKFALL_DEBUG=engine,config

const ENV_KEY = "BLOCKFALL_DEBUG" as const;

function readEnvTopics(): ReadonlyArray<string> {
  const raw = process.env[ENV_KEY];
  if (raw === undefined) return [];
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on") return ["*"];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function isDebugEnabled(topic?: string): boolean {
  const topics = readEnvTopics();
  if (topics.length === 0) return false;
  if (topics.includes("*")) return true;
  if (topic !== undefined) return topics.includes(topic);
  return true;
}

export function debugLog(topic: string, message: string, data?: unknown): void {
  if (!isDebugEnabled(topic)) return;
  if (data !== undefined) {
    console.warn(`[DBG:${topic}] ${message}`, data);
  } else {
    console.warn(`[DBG:${topic}] ${message}`);
  }
}

export function debugTable(topic: string, label: string, rows: unknown): void {
  if (!isDebugEnabled(topic)) return;
  console.warn(`[DBG:${topic}] ${label}`, rows);
}
