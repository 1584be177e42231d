import fs from "node:fs";
import path from "node:path";
import { config as loadDotenv } from "dotenv";
import { DEFAULT_MAX_WORD_LEN, EMPTY_TEXT_PLACEHOLDER } from "./constants.js";

const envCandidates = [
  path.resolve(process.cwd(), ".env.local"),
  path.resolve(process.cwd(), ".env"),
  path.resolve(process.cwd(), "..", "..", ".env"),
];

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    loadDotenv({ path: envPath, override: false, quiet: true });
  }
}

type Env = Record<string, string | undefined>;

export const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) return fallback;
  return parsed;
};

export const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") return true;
  if (normalized === "0" || normalized === "false" || normalized === "no") return false;
  return fallback;
};

export type NerConfig = {
  maxWordLen: number;
  emptyTextPlaceholder: string;
  resolveOverlap: boolean;
  registry: {
    path: string | undefined;
    cacheMax: number;
    cacheTtlMs: number;
  };
  http: {
    host: string;
    port: number;
  };
};

export function loadNerConfig(env: Env = process.env): NerConfig {
  return {
    maxWordLen: Math.max(
      1,
      Math.floor(parseNumber(env.NER_MAX_WORD_LEN, DEFAULT_MAX_WORD_LEN)),
    ),
    emptyTextPlaceholder:
      env.NER_EMPTY_TEXT_PLACEHOLDER?.trim() || EMPTY_TEXT_PLACEHOLDER,
    resolveOverlap: parseBoolean(env.NER_RESOLVE_OVERLAP, false),
    registry: {
      path: env.PREFIX_REGISTRY_PATH?.trim() || undefined,
      cacheMax: parseNumber(env.PREFIX_CACHE_MAX, 1000),
      cacheTtlMs: parseNumber(env.PREFIX_CACHE_TTL_MS, 60 * 60 * 1000),
    },
    http: {
      host: env.HOST ?? "0.0.0.0",
      port: parseNumber(env.PORT, 3000),
    },
  };
}

export const nerConfig = loadNerConfig();
