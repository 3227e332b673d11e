import path from 'path';

const DEFAULT_TASKS_FILE = 'tasks.json';
const DEFAULT_LOCK_STALE_MS = 15000;

export interface StoreConfig {
  dataDir: string;
  tasksFile: string;
  backupDir: string;
  lockStaleMs: number;
}

function expandHome(dir: string): string {
  return dir.startsWith('~/') ? path.join(process.env.HOME || '', dir.slice(2)) : dir;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function getDataDir(): string {
  const envPath = process.env.TASKWISE_DATA_DIR;
  if (envPath) return expandHome(envPath);
  return path.join(process.env.HOME || process.cwd(), 'Taskwise', 'data');
}

/**
 * Store locations and lock settings from the environment. Explicit `overrides` win over
 * the environment, and a relative `tasksFile` is placed inside the data dir.
 */
export function getStoreConfig(overrides: Partial<StoreConfig> = {}): StoreConfig {
  const dataDir = expandHome(overrides.dataDir ?? getDataDir());
  const tasksFile = overrides.tasksFile ?? (process.env.TASKWISE_TASKS_FILE || DEFAULT_TASKS_FILE);
  const backupDir = overrides.backupDir ?? (process.env.TASKWISE_BACKUP_DIR || path.join(dataDir, 'backups'));
  return {
    dataDir,
    tasksFile: path.resolve(dataDir, expandHome(tasksFile)),
    backupDir: expandHome(backupDir),
    lockStaleMs: overrides.lockStaleMs ?? parsePositiveInt(process.env.TASKWISE_LOCK_STALE_MS, DEFAULT_LOCK_STALE_MS),
  };
}
