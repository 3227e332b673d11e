import { TaskStore } from '../data';
import { createTask, estimateDuration, extractTags } from '../agents/planner';
import { optimizeSchedule, scheduleTask } from '../agents/scheduler';
import { checkReminders, createReminderMessage } from '../agents/reminder';
import { ProposedOperation, ProposedOperationSchema } from '../validation/schemas';
import { getClockTime, getLocalDateString } from '../utils/date';
import { ActivityEntry, ActivityLog, AgentName, OperationResult, PlannedTask, Task } from '../../types/data';

type UpdateTaskData = Extract<ProposedOperation, { op: 'update_task' }>['data'];

function describeOperation(raw: unknown): { op: string; description: string } {
  if (typeof raw === 'object' && raw !== null) {
    const op = 'op' in raw && typeof raw.op === 'string' ? raw.op : 'unknown';
    const description = 'description' in raw && typeof raw.description === 'string' ? raw.description : '';
    return { op, description };
  }
  return { op: 'unknown', description: '' };
}

function logActivity(log: ActivityLog, agent: AgentName, action: string, now: Date): void {
  log.push({ time: getClockTime(now), agent, action });
}

export function getRecentActivity(log: ActivityLog, limit = 10): ActivityEntry[] {
  return log.slice(-limit);
}

// Derived fields are recomputed from the merged content; the stale score is dropped.
function applyTaskChanges(task: Task, changes: UpdateTaskData): Task {
  const title = changes.title ?? task.title;
  const description = changes.description ?? task.description;
  const planned: PlannedTask = {
    id: task.id,
    title,
    description,
    priority: changes.priority ?? task.priority,
    dueDate: changes.dueDate ? new Date(changes.dueDate).toISOString() : task.dueDate,
    createdDate: task.createdDate,
    status: task.status,
    estimatedDuration: estimateDuration(title, description),
    tags: extractTags(title, description),
  };
  if (task.completedDate) {
    planned.completedDate = task.completedDate;
  }
  return scheduleTask(planned);
}

/**
 * Runs collaborator operations against the store in order, stopping at the first failure.
 * Agent actions are appended to the caller-owned `log`.
 */
export function executeOperations(
  store: TaskStore,
  operations: readonly unknown[],
  log: ActivityLog,
  now: Date = new Date()
): { results: OperationResult[]; allSucceeded: boolean } {
  const results: OperationResult[] = [];

  for (const raw of operations) {
    const parsed = ProposedOperationSchema.safeParse(raw);
    if (!parsed.success) {
      const result: OperationResult = {
        ...describeOperation(raw),
        success: false,
        error: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      };
      console.warn('Rejected invalid operation:', result.error);
      results.push(result);
      return { results, allSucceeded: false };
    }

    const op = parsed.data;
    try {
      const result = executeOneOperation(store, op, log, now);
      results.push(result);
      if (!result.success) {
        console.warn('Operation failed, stopping execution:', result);
        return { results, allSucceeded: false };
      }
    } catch (error) {
      console.error(`Operation ${op.op} threw error:`, error);
      results.push({
        op: op.op,
        description: op.description,
        success: false,
        error: error instanceof Error ? error.message : String(error),
      });
      return { results, allSucceeded: false };
    }
  }

  return { results, allSucceeded: true };
}

function executeOneOperation(
  store: TaskStore,
  op: ProposedOperation,
  log: ActivityLog,
  now: Date
): OperationResult {
  switch (op.op) {
    case 'create_task': {
      const planned = createTask(
        {
          title: op.data.title,
          description: op.data.description,
          priority: op.data.priority,
          dueDate: new Date(op.data.dueDate),
        },
        now
      );
      logActivity(log, 'Planner', `Created task: ${planned.title}`, now);
      const task = scheduleTask(planned);
      const due = new Date(task.dueDate);
      logActivity(log, 'Scheduler', `Scheduled task for ${getLocalDateString(due)} ${getClockTime(due)}`, now);
      if (!store.addTask(task)) {
        return { op: op.op, description: op.description, success: false, error: 'Failed to save task' };
      }
      return { op: op.op, description: op.description, success: true, entityId: task.id };
    }

    case 'update_task': {
      const existing = store.getTaskById(op.data.id);
      if (!existing) {
        return {
          op: op.op,
          description: op.description,
          success: false,
          error: `Task not found: ${op.data.id}`,
        };
      }
      const updated = applyTaskChanges(existing, op.data);
      if (!store.updateTask(existing.id, updated)) {
        return { op: op.op, description: op.description, success: false, error: 'Failed to update task' };
      }
      logActivity(log, 'Scheduler', `Rescheduled task: ${updated.title}`, now);
      return { op: op.op, description: op.description, success: true, entityId: existing.id };
    }

    case 'complete_task': {
      const task = store.completeTask(op.data.id, now);
      if (!task) {
        return {
          op: op.op,
          description: op.description,
          success: false,
          error: `Task not found or not saved: ${op.data.id}`,
        };
      }
      return { op: op.op, description: op.description, success: true, entityId: task.id };
    }

    case 'delete_task': {
      const deleted = store.deleteTask(op.data.id);
      return deleted
        ? { op: op.op, description: op.description, success: true, entityId: op.data.id }
        : { op: op.op, description: op.description, success: false, error: `Task not found: ${op.data.id}` };
    }

    case 'optimize_schedule': {
      const ranked = optimizeSchedule(store.getAllTasks(), now);
      const scored = ranked.filter((task) => task.optimizationScore !== undefined);
      // Non-pending records come back unscored, so saving them clears any earlier score.
      if (!store.updateTasks(ranked)) {
        return {
          op: op.op,
          description: op.description,
          success: false,
          error: `Failed to save scores for ${scored.length} task(s)`,
        };
      }
      logActivity(log, 'Scheduler', `Optimized task schedule (${scored.length} tasks scored)`, now);
      return {
        op: op.op,
        description: op.description,
        success: true,
        messages: ranked.map((task) =>
          task.optimizationScore === undefined ? task.title : `${task.title} (${task.optimizationScore})`
        ),
      };
    }

    case 'check_reminders': {
      const reminders = checkReminders(store.getAllTasks(), now);
      logActivity(log, 'Reminder', `Checked ${reminders.length} reminders`, now);
      return {
        op: op.op,
        description: op.description,
        success: true,
        messages: reminders.map((task) => createReminderMessage(task, now)),
      };
    }
  }
}
