import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call.
// If executing from src/, resolve ../.env (project root). Otherwise use default.
(() => {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch (e) {
    console.error("[RAG] Could not resolve project .env, falling back to cwd:", e);
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

/**
 * Runtime configuration. Built once at startup and handed to every component;
 * nothing below reads process.env directly.
 */
export interface Config {
  /** Minimum number of candidates that must survive the similarity cutoff. */
  MIN_HITS: number;
  /** Candidates scoring strictly below this are dropped. */
  SIMILARITY_CUTOFF: number;
  /** Abstain when the mean surviving score is strictly below this. */
  CONFIDENCE_THRESHOLD: number;
  /** Per-index result count (base and delta each return up to TOP_K). */
  TOP_K: number;
  TEMPERATURE: number;
  /** Expertise the answer prompt frames the assistant with. */
  ASSISTANT_DOMAIN: string;
  DATA_ROOT: string;
  STORAGE_ROOT: string;
  DELTA_ROOT: string;
  STATE_ROOT: string;
  INJECT_ROOT: string;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  GEMINI_API_KEY: string | undefined;
  GENERATION_MODEL: string;
  EMBEDDING_MODEL: string;
  GENERATION_TIMEOUT_MS: number;
  MCP_TRANSPORT: string;
  PORT: number;
  HOST: string;
  /** Host[:port] whitelist for MCP over HTTP; undefined means local-only defaults. */
  ALLOWED_HOSTS: string[] | undefined;
  DNS_REBINDING_PROTECTION: boolean;
  VERBOSE: boolean;
}

type Env = Record<string, string | undefined>;

function readNumber(
  raw: string | undefined,
  fallback: number,
  accept: (n: number) => boolean = Number.isFinite,
): number {
  const trimmed = raw?.trim();
  if (!trimmed) return fallback;
  const n = Number(trimmed);
  return Number.isFinite(n) && accept(n) ? n : fallback;
}

function readPath(raw: string | undefined, fallback: string): string {
  return path.resolve(raw?.trim() || fallback);
}

/** Pure configuration parser; malformed values fall back to their defaults. */
export function parseConfig(env: Env): Config {
  // Verbosity toggle with tolerant truthy parsing (supports several common forms).
  const VERBOSE = (() => {
    const v = (env.VERBOSE ?? "").trim().toLowerCase();
    return v === "1" || v === "true" || v === "yes" || v === "on";
  })();

  const MIN_HITS = Math.floor(readNumber(env.MIN_HITS, 1, (n) => n >= 0));
  const SIMILARITY_CUTOFF = readNumber(env.SIMILARITY_CUTOFF, 0.5);
  const CONFIDENCE_THRESHOLD = readNumber(env.CONFIDENCE_THRESHOLD, 0.1);
  const TOP_K = Math.min(50, Math.floor(readNumber(env.TOP_K, 5, (n) => n >= 1)));
  const TEMPERATURE = readNumber(env.TEMPERATURE, 0, (n) => n >= 0 && n <= 2);

  // Chunk size impacts recall (too large) vs. precision (too small).
  const CHUNK_SIZE = Math.min(8000, Math.floor(readNumber(env.CHUNK_SIZE, 800, (n) => n > 0)));
  const CHUNK_OVERLAP = Math.min(
    4000,
    Math.floor(readNumber(env.CHUNK_OVERLAP, 120, (n) => n >= 0)),
  );

  return {
    MIN_HITS,
    SIMILARITY_CUTOFF,
    CONFIDENCE_THRESHOLD,
    TOP_K,
    TEMPERATURE,
    ASSISTANT_DOMAIN: env.ASSISTANT_DOMAIN?.trim() || "Kubernetes and cloud-native technologies",
    DATA_ROOT: readPath(env.DATA_ROOT, "data"),
    STORAGE_ROOT: readPath(env.STORAGE_ROOT, "storage"),
    DELTA_ROOT: readPath(env.DELTA_ROOT, "storage-delta"),
    STATE_ROOT: readPath(env.STATE_ROOT, "state"),
    INJECT_ROOT: readPath(env.INJECT_ROOT, "injected"),
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    GEMINI_API_KEY: env.GEMINI_API_KEY?.trim() || undefined,
    GENERATION_MODEL: env.GENERATION_MODEL?.trim() || "gemini-2.5-pro",
    EMBEDDING_MODEL: env.EMBEDDING_MODEL?.trim() || "text-embedding-004",
    GENERATION_TIMEOUT_MS: readNumber(env.GENERATION_TIMEOUT_MS, 60_000, (n) => n > 0),
    // Transport mode: 'http' (default) or 'stdio'.
    MCP_TRANSPORT: (env.MCP_TRANSPORT ?? "").trim().toLowerCase() || "http",
    PORT: Math.floor(readNumber(env.PORT, 5000, (n) => n > 0 && n < 65536)),
    HOST: env.HOST?.trim() || "127.0.0.1",
    ALLOWED_HOSTS: env.ALLOWED_HOSTS?.split(",")
      .map((s) => s.trim())
      .filter(Boolean),
    DNS_REBINDING_PROTECTION: (env.ENABLE_DNS_REBINDING_PROTECTION ?? "true").trim() !== "false",
    VERBOSE,
  };
}

export function getConfig(): Config {
  return parseConfig(process.env);
}
