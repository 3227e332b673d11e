import { DailySummary, ReminderType, Task, TaskPriority } from '../../types/data';
import { HOUR_MS, MINUTE_MS, formatDuration, isSameLocalDay } from '../utils/date';

interface ReminderThreshold {
  withinMs: number;
  type: ReminderType;
}

const THIRTY_MINUTES: ReminderThreshold = { withinMs: 30 * MINUTE_MS, type: 'due_in_30min' };
const ONE_HOUR: ReminderThreshold = { withinMs: HOUR_MS, type: 'due_in_1h' };
const TWO_HOURS: ReminderThreshold = { withinMs: 2 * HOUR_MS, type: 'due_in_2h' };

// Widest first. A task is labelled with the tightest threshold it falls within.
export const REMINDER_THRESHOLDS: Record<TaskPriority, readonly ReminderThreshold[]> = {
  High: [TWO_HOURS, ONE_HOUR, THIRTY_MINUTES],
  Medium: [ONE_HOUR, THIRTY_MINUTES],
  Low: [THIRTY_MINUTES],
};

export function classifyReminder(task: Task, now: Date = new Date()): ReminderType | null {
  if (task.status === 'completed') return null;

  const timeUntilDue = Date.parse(task.dueDate) - now.getTime();
  if (timeUntilDue < 0) return 'overdue';

  let match: ReminderType | null = null;
  for (const threshold of REMINDER_THRESHOLDS[task.priority]) {
    if (timeUntilDue <= threshold.withinMs) {
      match = threshold.type;
    }
  }
  return match;
}

/** Returns copies of the tasks that need attention, each carrying its `reminderType`. */
export function checkReminders(tasks: readonly Task[], now: Date = new Date()): Task[] {
  const reminders: Task[] = [];
  for (const task of tasks) {
    const reminderType = classifyReminder(task, now);
    if (reminderType) {
      reminders.push({ ...task, tags: [...task.tags], reminderType });
    }
  }
  return reminders;
}

export function createReminderMessage(task: Task, now: Date = new Date()): string {
  const timeDiff = Date.parse(task.dueDate) - now.getTime();
  if (timeDiff < 0) {
    return `OVERDUE: '${task.title}' was due ${formatDuration(timeDiff)} ago`;
  }
  return `REMINDER: '${task.title}' is due in ${formatDuration(timeDiff)}`;
}

export function getDailySummary(tasks: readonly Task[], now: Date = new Date()): DailySummary {
  const tasksToday = tasks.filter(
    (task) => task.status === 'pending' && isSameLocalDay(new Date(task.dueDate), now)
  );
  return {
    countToday: tasksToday.length,
    highPriorityToday: tasksToday.filter((task) => task.priority === 'High').length,
    tasksToday,
  };
}
