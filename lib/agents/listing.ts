import { Task, TaskPriority, TaskStatus } from '../../types/data';

export type TaskSortKey = 'dueDate' | 'priority' | 'created';

export interface TaskFilter {
  status?: TaskStatus;
  priority?: TaskPriority;
}

const PRIORITY_ORDER: Record<TaskPriority, number> = { High: 3, Medium: 2, Low: 1 };

export function filterTasks(tasks: readonly Task[], filter: TaskFilter = {}): Task[] {
  return tasks.filter((task) => {
    if (filter.status && task.status !== filter.status) return false;
    if (filter.priority && task.priority !== filter.priority) return false;
    return true;
  });
}

// 'created' keeps store order, which is insertion order.
export function sortTasks(tasks: readonly Task[], by: TaskSortKey): Task[] {
  const sorted = [...tasks];
  switch (by) {
    case 'dueDate':
      return sorted.sort((a, b) => Date.parse(a.dueDate) - Date.parse(b.dueDate));
    case 'priority':
      return sorted.sort((a, b) => PRIORITY_ORDER[b.priority] - PRIORITY_ORDER[a.priority]);
    case 'created':
      return sorted;
  }
}
