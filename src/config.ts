import dotenv from 'dotenv';
import {
  NAMEBASE_API_ROOT,
  NAMEBASE_API_VERSION,
  NAMEBASE_WS_BASE,
} from './exchange/namebase/endpoints.js';

dotenv.config();

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  return v !== undefined && v !== '' ? Number(v) : fallback;
}

export const config = {
  namebase: {
    accessKey: env('NAMEBASE_ACCESS_KEY', ''),
    secretKey: env('NAMEBASE_SECRET_KEY', ''),
    apiRoot: env('NAMEBASE_API_ROOT', NAMEBASE_API_ROOT),
    apiVersion: env('NAMEBASE_API_VERSION', NAMEBASE_API_VERSION),
    wsUrl: env('NAMEBASE_WS_URL', NAMEBASE_WS_BASE),
    timeoutMs: envNum('NAMEBASE_TIMEOUT_MS', 30_000),
  },

  log: {
    level: env('LOG_LEVEL', 'info'),
  },
} as const;
