// Lightweight, opt-in debug logging for the CLI and tests

// Topics are enabled via the KEYMASH_DEBUG environment variable:
// - "true", "1", "on" enable everything
// - a comma list enables topics, e.g. KEYMASH_DEBUG=engine,resources

const ENV_KEY = "KEYMASH_DEBUG";

export type DebugTopic =
  | "engine"
  | "commands"
  | "mapping"
  | "resources"
  | "input"
  | "rng";

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

export function isDebugEnabled(topic?: DebugTopic): boolean {
  const topics = readEnvTopics();
  if (topics.length === 0) return false;
  if (topics.includes("*")) return true;
  if (topic !== undefined) return topics.includes(topic);
  return true;
}

export function debugLog(
  topic: DebugTopic,
  message: string,
  data?: unknown,
): void {
  if (!isDebugEnabled(topic)) return;
  if (data !== undefined) {
    console.warn(`[DBG:${topic}] ${message}`, data);
  } else {
    console.warn(`[DBG:${topic}] ${message}`);
  }
}

// Operational messages: always printed, independent of debug topics
export function logWarn(message: string, error?: unknown): void {
  if (error !== undefined) {
    console.warn(`[keymash] ${message}`, error);
  } else {
    console.warn(`[keymash] ${message}`);
  }
}

export function logInfo(message: string): void {
  console.info(`[keymash] ${message}`);
}
