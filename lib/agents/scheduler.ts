import { PlannedTask, Task, TaskPriority } from '../../types/data';
import { DAY_MS, HOUR_MS, MINUTE_MS } from '../utils/date';

export const BUFFER_TIME_MINUTES = 15;

const LEAD_TIME_MS: Record<TaskPriority, number> = {
  High: 2 * HOUR_MS,
  Medium: HOUR_MS,
  Low: 30 * MINUTE_MS,
};

const PRIORITY_SCORES: Record<TaskPriority, number> = { High: 3, Medium: 2, Low: 1 };

// May land in the past when the lead time exceeds the time left; callers get it unclamped.
export function calculateOptimalTime(task: Pick<PlannedTask, 'dueDate' | 'priority'>): string {
  return new Date(Date.parse(task.dueDate) - LEAD_TIME_MS[task.priority]).toISOString();
}

export function calculatePrepTime(tags: readonly string[]): number {
  if (tags.includes('meeting')) return 15;
  if (tags.includes('report')) return 30;
  return 5;
}

export function scheduleTask(task: PlannedTask): Task {
  return {
    ...task,
    tags: [...task.tags],
    scheduledTime: calculateOptimalTime(task),
    preparationTime: calculatePrepTime(task.tags),
    bufferTime: BUFFER_TIME_MINUTES,
  };
}

/** Urgency (1-5 and above for overdue work) plus a 1-3 priority weight. */
export function scoreTask(task: Pick<Task, 'dueDate' | 'priority'>, now: Date = new Date()): number {
  const daysUntilDue = Math.floor((Date.parse(task.dueDate) - now.getTime()) / DAY_MS);
  const urgency = Math.max(1, 5 - daysUntilDue);
  return urgency + PRIORITY_SCORES[task.priority];
}

/**
 * Re-ranks tasks by optimization score. Pending tasks come first, highest score first,
 * with ties in input order; every other task follows unscored in its original order.
 * Neither the array nor its tasks are mutated.
 */
export function optimizeSchedule(tasks: readonly Task[], now: Date = new Date()): Task[] {
  const scored: Task[] = [];
  const rest: Task[] = [];
  for (const task of tasks) {
    if (task.status === 'pending') {
      scored.push({ ...task, tags: [...task.tags], optimizationScore: scoreTask(task, now) });
    } else {
      const { optimizationScore: _stale, ...unscored } = task;
      rest.push({ ...unscored, tags: [...task.tags] });
    }
  }
  // Array.prototype.sort is stable.
  scored.sort((a, b) => (b.optimizationScore ?? 0) - (a.optimizationScore ?? 0));
  return [...scored, ...rest];
}
