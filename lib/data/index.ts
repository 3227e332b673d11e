import fs from 'fs';
import path from 'path';
import crypto from 'crypto';
import lockfile from 'proper-lockfile';
import { Task, TaskPriority, TaskStatus, StoreStats } from '../../types/data';
import { TasksFileSchema } from '../validation/schemas';
import { getStoreConfig } from '../config';
import { getFileTimestamp } from '../utils/date';

export interface TaskStoreOptions {
  filePath?: string;
  backupDir?: string;
  lockStaleMs?: number;
}

type ReadResult =
  | { ok: true; tasks: Task[] }
  | { ok: false; reason: 'missing' | 'corrupt'; error: string };

// fs errors may come from another realm (Jest), so no instanceof checks here.
function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

function cloneTask(task: Task): Task {
  return { ...task, tags: [...task.tags] };
}

function readTasksFile(filepath: string): ReadResult {
  let content: string;
  try {
    content = fs.readFileSync(filepath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return { ok: false, reason: 'missing', error: `${filepath} does not exist` };
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return { ok: false, reason: 'corrupt', error: errorMessage(error) };
  }

  const result = TasksFileSchema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, reason: 'corrupt', error: result.error.message };
  }
  return { ok: true, tasks: result.data };
}

// Temp file plus rename: readers see the old file or the new one, never a partial write.
function writeDataUnsafe(filepath: string, data: Task[]): void {
  const tempPath = `${filepath}.tmp.${crypto.randomUUID()}`;
  try {
    fs.writeFileSync(tempPath, JSON.stringify(data, null, 2), 'utf-8');
    fs.renameSync(tempPath, filepath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

function withFileLock<T>(filepath: string, staleMs: number, fn: () => T): T {
  fs.mkdirSync(path.dirname(filepath), { recursive: true });
  let release: () => void;
  try {
    release = lockfile.lockSync(filepath, { stale: staleMs, realpath: false });
  } catch (error) {
    throw new Error(`Tasks file is locked by another process: ${errorMessage(error)}`);
  }
  try {
    return fn();
  } finally {
    release();
  }
}

/**
 * In-memory task list mirrored to a single JSON file.
 *
 * Every mutation validates the next state, rewrites the whole file under a lock and only
 * then swaps the in-memory list, so a failed write leaves the store as it was. Expected
 * failures are logged and reported as `false`/`null`, never thrown.
 */
export class TaskStore {
  readonly filePath: string;
  readonly backupDir: string;
  private readonly lockStaleMs: number;
  private tasks: Task[];

  constructor(options: TaskStoreOptions = {}) {
    const config = getStoreConfig({
      tasksFile: options.filePath,
      backupDir: options.backupDir,
      lockStaleMs: options.lockStaleMs,
    });
    this.filePath = config.tasksFile;
    this.backupDir = config.backupDir;
    this.lockStaleMs = config.lockStaleMs;
    this.tasks = this.load();
  }

  private load(): Task[] {
    const result = readTasksFile(this.filePath);
    if (result.ok) return result.tasks;
    if (result.reason === 'missing') return [];

    console.error(`Corrupted file: ${this.filePath}`, result.error);
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const corruptPath = `${this.filePath}.corrupt.${timestamp}`;
    try {
      fs.renameSync(this.filePath, corruptPath);
      console.log(`Renamed corrupted file to ${corruptPath}`);
    } catch (error) {
      console.error(`Could not move corrupted file aside: ${errorMessage(error)}`);
    }
    return [];
  }

  private persist(next: Task[]): boolean {
    const validation = TasksFileSchema.safeParse(next);
    if (!validation.success) {
      console.error(`Validation failed before write for ${this.filePath}:`, validation.error.message);
      return false;
    }
    try {
      withFileLock(this.filePath, this.lockStaleMs, () => writeDataUnsafe(this.filePath, next));
    } catch (error) {
      console.error(`Error saving tasks: ${errorMessage(error)}`);
      return false;
    }
    this.tasks = next;
    return true;
  }

  private resolveBackupPath(fileName: string): string {
    return path.resolve(this.backupDir, fileName);
  }

  addTask(task: Task): boolean {
    if (this.tasks.some((t) => t.id === task.id)) {
      console.warn(`Task ${task.id} already exists`);
      return false;
    }
    return this.persist([...this.tasks, cloneTask(task)]);
  }

  getAllTasks(): Task[] {
    return this.tasks.map(cloneTask);
  }

  getTaskById(id: string): Task | null {
    const task = this.tasks.find((t) => t.id === id);
    return task ? cloneTask(task) : null;
  }

  updateTask(id: string, updated: Task): boolean {
    const index = this.tasks.findIndex((t) => t.id === id);
    if (index === -1) return false;
    if (updated.id !== id) {
      console.warn(`Refusing to change id of task ${id} to ${updated.id}`);
      return false;
    }
    if (this.tasks[index].status === 'completed' && updated.status !== 'completed') {
      console.warn(`Cannot reopen completed task ${id}`);
      return false;
    }

    const next = [...this.tasks];
    next[index] = cloneTask(updated);
    return this.persist(next);
  }

  /**
   * Replaces several stored records with a single rewrite. Either every record is saved or
   * none is; the same id and reopen checks as `updateTask` apply to each.
   */
  updateTasks(updates: readonly Task[]): boolean {
    const next = [...this.tasks];
    for (const updated of updates) {
      const index = next.findIndex((t) => t.id === updated.id);
      if (index === -1) {
        console.warn(`Task ${updated.id} not found`);
        return false;
      }
      if (next[index].status === 'completed' && updated.status !== 'completed') {
        console.warn(`Cannot reopen completed task ${updated.id}`);
        return false;
      }
      next[index] = cloneTask(updated);
    }
    return this.persist(next);
  }

  completeTask(id: string, now: Date = new Date()): Task | null {
    const task = this.tasks.find((t) => t.id === id);
    if (!task) return null;
    if (task.status === 'completed') return cloneTask(task);

    const completed: Task = { ...cloneTask(task), status: 'completed', completedDate: now.toISOString() };
    if (!this.updateTask(id, completed)) return null;
    return cloneTask(completed);
  }

  deleteTask(id: string): boolean {
    const next = this.tasks.filter((t) => t.id !== id);
    if (next.length === this.tasks.length) return false;
    return this.persist(next);
  }

  getTasksByStatus(status: TaskStatus): Task[] {
    return this.tasks.filter((t) => t.status === status).map(cloneTask);
  }

  getTasksByPriority(priority: TaskPriority): Task[] {
    return this.tasks.filter((t) => t.priority === priority).map(cloneTask);
  }

  getOverdueTasks(now: Date = new Date()): Task[] {
    return this.tasks
      .filter((t) => t.status !== 'completed' && Date.parse(t.dueDate) < now.getTime())
      .map(cloneTask);
  }

  getStats(now: Date = new Date()): StoreStats {
    const completedTasks = this.tasks.filter((t) => t.status === 'completed').length;
    const priorityCounts: Record<TaskPriority, number> = { High: 0, Medium: 0, Low: 0 };
    for (const task of this.tasks) {
      if (task.status !== 'completed') {
        priorityCounts[task.priority] += 1;
      }
    }

    let fileSize = 0;
    try {
      fileSize = fs.statSync(this.filePath).size;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') throw error;
    }

    return {
      totalTasks: this.tasks.length,
      completedTasks,
      pendingTasks: this.tasks.length - completedTasks,
      overdueTasks: this.getOverdueTasks(now).length,
      priorityCounts,
      fileSize,
    };
  }

  /** Writes the current tasks to a backup file and returns its path, or `null` if the write failed. */
  backupTasks(fileName?: string, now: Date = new Date()): string | null {
    const backupPath = this.resolveBackupPath(fileName ?? `tasks_backup_${getFileTimestamp(now)}.json`);
    try {
      fs.mkdirSync(path.dirname(backupPath), { recursive: true });
      writeDataUnsafe(backupPath, this.tasks);
    } catch (error) {
      console.error(`Error creating backup: ${errorMessage(error)}`);
      return null;
    }
    console.log(`Backed up ${this.tasks.length} tasks to ${backupPath}`);
    return backupPath;
  }

  restoreFromBackup(fileName: string): boolean {
    const backupPath = this.resolveBackupPath(fileName);
    let result: ReadResult;
    try {
      result = readTasksFile(backupPath);
    } catch (error) {
      console.error(`Error restoring from backup: ${errorMessage(error)}`);
      return false;
    }
    if (!result.ok) {
      console.error(`Error restoring from backup: ${result.error}`);
      return false;
    }
    if (!this.persist(result.tasks)) return false;
    console.log(`Restored ${result.tasks.length} tasks from ${backupPath}`);
    return true;
  }
}
