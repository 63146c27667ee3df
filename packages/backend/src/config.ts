/**
 * @description: Centralizes backend runtime configuration defaults and env parsing.
 * @scope: utility
 * @module: BackendRuntimeConfig
 * @risk: moderate - Misconfiguration can bind the wrong port or reject valid payloads.
 */
import fs from 'node:fs';
import path from 'node:path';
import { config as loadEnvFile } from 'dotenv';

// --- Environment bootstrap ---
// Load variables from a .env file beside the working directory when present.
const envFilePath = path.join(process.cwd(), '.env');
if (fs.existsSync(envFilePath)) {
  loadEnvFile({ path: envFilePath });
}

type RuntimeConfig = {
  server: {
    host: string;
    port: number;
  };
  posts: {
    collectionPath: string;
    maxBodyBytes: number;
  };
};

// --- Helpers ---
const parsePositiveIntEnv = (value: string | undefined, fallback: number): number => {
  if (!value || !/^\d+$/.test(value.trim())) {
    return fallback;
  }

  const parsed = parseInt(value.trim(), 10);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : fallback;
};

const normalizeCollectionPath = (value: string | undefined, fallback: string): string => {
  const trimmed = value?.trim();
  if (!trimmed) {
    return fallback;
  }

  // Always a single leading slash and no trailing one, so item paths are `${path}/${id}`.
  const normalized = `/${trimmed.replace(/^\/+/, '').replace(/\/+$/, '')}`;
  return normalized === '/' ? fallback : normalized;
};

// --- Defaults ---
const DEFAULT_PORT = 8080;
const DEFAULT_HOST = '::';
const DEFAULT_COLLECTION_PATH = '/posts';
const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

// --- Runtime config ---
const runtimeConfig: RuntimeConfig = {
  server: {
    host: process.env.HOST?.trim() || DEFAULT_HOST,
    port: parsePositiveIntEnv(process.env.PORT, DEFAULT_PORT)
  },
  posts: {
    collectionPath: normalizeCollectionPath(process.env.POSTS_COLLECTION_PATH, DEFAULT_COLLECTION_PATH),
    maxBodyBytes: parsePositiveIntEnv(process.env.POSTS_MAX_BODY_BYTES, DEFAULT_MAX_BODY_BYTES)
  }
};

export { runtimeConfig, parsePositiveIntEnv, normalizeCollectionPath };
export type { RuntimeConfig };
