/**
 * Centralized pipeline policy configuration.
 *
 * Every value is read from the environment with a named default so the
 * expiry window, venue matching tolerance and fetch budgets stay explicit.
 */

function readInt(name: string, fallback: number, min = 1): number {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n < min) return fallback;
  return n;
}

function readFloat(name: string, fallback: number, min: number, max: number): number {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;
  const n = Number.parseFloat(raw);
  if (!Number.isFinite(n) || n < min || n > max) return fallback;
  return n;
}

function readBool(name: string, fallback: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  return fallback;
}

export const DEFAULT_RETENTION_DAYS = 14;
export const DEFAULT_VENUE_NAME_TOLERANCE = 0.25;
export const DEFAULT_RUN_STALE_AFTER_MINUTES = 120;
export const DEFAULT_FALLBACK_THRESHOLD = 0.6;
export const DEFAULT_EXTRACTOR_VERSION = "hardcoded-v1";

/** Days an active activity may go unseen by its source before it is expired. */
export function getRetentionDays(): number {
  return readInt("ACTIVITY_RETENTION_DAYS", DEFAULT_RETENTION_DAYS);
}

export function getRetentionCutoff(now = new Date()): Date {
  return new Date(now.getTime() - getRetentionDays() * 24 * 60 * 60 * 1000);
}

/** 0 means exact (case-insensitive) venue names only; 0.25 accepts a name token Jaccard of 0.75. */
export function getVenueNameTolerance(): number {
  return readFloat("VENUE_NAME_TOLERANCE", DEFAULT_VENUE_NAME_TOLERANCE, 0, 1);
}

export function getRunStaleAfterMinutes(): number {
  return readInt("RUN_STALE_AFTER_MINUTES", DEFAULT_RUN_STALE_AFTER_MINUTES);
}

export function getExtractorVersion(): string {
  return process.env.EXTRACTOR_VERSION?.trim() || DEFAULT_EXTRACTOR_VERSION;
}

export interface FetchPolicyConfig {
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  hostMinIntervalMs: number;
}

export function getFetchPolicyConfig(): FetchPolicyConfig {
  return {
    timeoutMs: readInt("FETCH_TIMEOUT_MS", 30_000),
    maxAttempts: readInt("FETCH_MAX_ATTEMPTS", 4),
    baseDelayMs: readInt("FETCH_BACKOFF_BASE_MS", 2_000, 0),
    hostMinIntervalMs: readInt("HOST_MIN_INTERVAL_MS", 1_500, 0),
  };
}

export interface FallbackConfig {
  enabled: boolean;
  provider: string;
  model: string;
  apiKey: string | null;
  maxDocumentChars: number;
}

export function getFallbackConfig(): FallbackConfig {
  const apiKey = process.env.OPENAI_API_KEY?.trim() || null;
  return {
    enabled: readBool("LLM_ENABLED", false) && apiKey != null,
    provider: process.env.LLM_PROVIDER?.trim() || "openai",
    model: process.env.LLM_MODEL?.trim() || "gpt-4o-mini",
    apiKey,
    maxDocumentChars: readInt("LLM_MAX_DOCUMENT_CHARS", 24_000),
  };
}
