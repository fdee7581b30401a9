import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import { getPlannerConfig } from "./config";

// ===========================================
// LLM Request/Response Logging Types
// ===========================================

const logMessageSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string(),
});

const logEntrySchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  provider: z.string(),

  request: z.object({
    model: z.string(),
    messages: z.array(logMessageSchema),
    temperature: z.number().optional(),
    max_tokens: z.number().optional(),
    json_mode: z.boolean().optional(),
  }),

  response: z.object({
    content: z.string(),
    usage: z
      .object({
        prompt_tokens: z.number(),
        completion_tokens: z.number(),
        total_tokens: z.number(),
      })
      .optional(),
  }),

  metadata: z.object({
    duration_ms: z.number(),
    success: z.boolean(),
    error: z.string().optional(),
    user_context: z.record(z.unknown()).optional(),
  }),
});

const logIndexSchema = z.object({
  total_entries: z.number(),
  last_updated: z.string(),
  entries: z.array(
    z.object({
      id: z.string(),
      timestamp: z.string(),
      provider: z.string(),
      preview: z.string(),
      success: z.boolean(),
    })
  ),
});

export type LLMLogEntry = z.infer<typeof logEntrySchema>;
export type LogIndex = z.infer<typeof logIndexSchema>;
export type LogMessage = z.infer<typeof logMessageSchema>;

// ===========================================
// Logger Configuration
// ===========================================

const MAX_LOG_ENTRIES = 1000; // Max entries to keep in index

function getLogDir(): string {
  return getPlannerConfig().llmLogDir;
}

export function isLoggingEnabled(): boolean {
  return getPlannerConfig().llmLogEnabled;
}

function generateLogId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `log_${timestamp}_${random}`;
}

function getDatePath(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}/${month}/${day}`;
}

function emptyIndex(): LogIndex {
  return {
    total_entries: 0,
    last_updated: new Date().toISOString(),
    entries: [],
  };
}

async function readJsonFile<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
  try {
    const content = await fs.readFile(filePath, "utf-8");
    const parsed = schema.safeParse(JSON.parse(content));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    console.warn(`[LLMLogger] Could not read ${filePath}:`, error);
    return null;
  }
}

// ===========================================
// Core Logging Functions
// ===========================================

export async function logLLMRequest(entry: LLMLogEntry): Promise<string> {
  const logDir = getLogDir();
  const fullDir = path.join(logDir, getDatePath(new Date(entry.timestamp)));

  await fs.mkdir(fullDir, { recursive: true });

  const logFile = path.join(fullDir, `${entry.id}.json`);
  await fs.writeFile(logFile, JSON.stringify(entry, null, 2));

  await updateLogIndex(entry);

  return entry.id;
}

async function updateLogIndex(entry: LLMLogEntry): Promise<void> {
  const indexPath = path.join(getLogDir(), "index.json");
  const index = (await readJsonFile(indexPath, logIndexSchema)) ?? emptyIndex();

  const preview = entry.request.messages
    .filter((m) => m.role === "user")
    .map((m) => m.content.substring(0, 100))
    .join(" ")
    .substring(0, 150);

  index.entries.unshift({
    id: entry.id,
    timestamp: entry.timestamp,
    provider: entry.provider,
    preview: preview + (preview.length >= 150 ? "..." : ""),
    success: entry.metadata.success,
  });

  if (index.entries.length > MAX_LOG_ENTRIES) {
    index.entries = index.entries.slice(0, MAX_LOG_ENTRIES);
  }

  index.total_entries++;
  index.last_updated = new Date().toISOString();

  await fs.writeFile(indexPath, JSON.stringify(index, null, 2));
}

// ===========================================
// Retrieval Functions
// ===========================================

export async function getLogIndex(): Promise<LogIndex> {
  return (await readJsonFile(path.join(getLogDir(), "index.json"), logIndexSchema)) ?? emptyIndex();
}

export async function getLogEntry(id: string): Promise<LLMLogEntry | null> {
  const index = await getLogIndex();
  const indexed = index.entries.find((e) => e.id === id);
  if (!indexed) {
    return null;
  }

  const logFile = path.join(getLogDir(), getDatePath(new Date(indexed.timestamp)), `${id}.json`);
  return readJsonFile(logFile, logEntrySchema);
}

// ===========================================
// Replay Matching
// ===========================================

export interface ReplayMatch {
  found: boolean;
  entry?: LLMLogEntry;
}

function conversationKey(messages: LogMessage[]): string {
  return messages.map((m) => `${m.role}:${m.content.trim()}`).join("|||");
}

/**
 * Find a successful recorded response for the exact same message list from the same provider.
 * The whole conversation must match, not just the last message.
 */
export async function findReplayMatch(
  provider: string,
  messages: LogMessage[]
): Promise<ReplayMatch> {
  const index = await getLogIndex();
  const candidates = index.entries.filter((e) => e.provider === provider && e.success);

  if (candidates.length === 0) {
    return { found: false };
  }

  const key = conversationKey(messages);

  for (const candidate of candidates) {
    const entry = await getLogEntry(candidate.id);
    if (entry && conversationKey(entry.request.messages) === key) {
      console.log(`[Replay] Exact conversation match found: ${entry.id}`);
      return { found: true, entry };
    }
  }

  console.log("[Replay] No exact conversation match - will call the provider");
  return { found: false };
}

// ===========================================
// Helper to Create Log Entry
// ===========================================

export function createLogEntry(
  provider: string,
  request: LLMLogEntry["request"],
  response: LLMLogEntry["response"],
  durationMs: number,
  success: boolean,
  error?: string,
  userContext?: Record<string, unknown>
): LLMLogEntry {
  return {
    id: generateLogId(),
    timestamp: new Date().toISOString(),
    provider,
    request,
    response,
    metadata: {
      duration_ms: durationMs,
      success,
      error,
      user_context: userContext,
    },
  };
}
