import { availableParallelism } from 'node:os';

import { isLogLevel, type LogLevel } from '../utils/logger.js';

const MAX_PARALLEL_BUILD_COUNT = 512;
const DEFAULT_WORK_DIR = '.partwright';
const DEFAULT_LOG_LEVEL: LogLevel = 'info';

type Env = Record<string, string | undefined>;

/** `PARTWRIGHT_PARALLEL_BUILD_COUNT`, clamped to 1..512; the CPU count when unset or invalid. */
export function resolveParallelBuildCount(env: Env = process.env): number {
  const fallback = Math.max(1, availableParallelism());
  const raw = env.PARTWRIGHT_PARALLEL_BUILD_COUNT;
  if (!raw || !raw.trim()) return fallback;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return fallback;

  const n = Math.floor(parsed);
  if (n < 1) return 1;
  return Math.min(n, MAX_PARALLEL_BUILD_COUNT);
}

export function resolveWorkDir(env: Env = process.env): string {
  const raw = env.PARTWRIGHT_WORK_DIR;
  if (!raw || !raw.trim()) return DEFAULT_WORK_DIR;
  return raw.trim();
}

export function resolveLogLevel(env: Env = process.env): LogLevel {
  const raw = env.PARTWRIGHT_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL;
}

export function resolveLogJson(env: Env = process.env): boolean {
  const raw = env.PARTWRIGHT_LOG_JSON?.trim().toLowerCase();
  return raw === '1' || raw === 'true' || raw === 'yes';
}
