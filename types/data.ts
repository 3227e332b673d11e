// types/data.ts
// Core domain models used throughout Taskwise.

export type TaskPriority = 'Low' | 'Medium' | 'High';
export type TaskStatus = 'pending' | 'completed';
export type ReminderType = 'overdue' | 'due_in_2h' | 'due_in_1h' | 'due_in_30min';
export type EstimatedDuration = 30 | 60 | 120;
export type AgentName = 'Planner' | 'Scheduler' | 'Reminder';

export interface Task {
  id: string;
  title: string;
  description: string;
  priority: TaskPriority;
  dueDate: string;
  createdDate: string;
  status: TaskStatus;
  completedDate?: string;
  estimatedDuration: EstimatedDuration;
  tags: string[];
  scheduledTime: string;
  preparationTime: number;
  bufferTime: number;
  optimizationScore?: number;
  reminderType?: ReminderType;
}

// A task as the Planner produces it, before the Scheduler has annotated it.
export type PlannedTask = Omit<Task, 'scheduledTime' | 'preparationTime' | 'bufferTime'>;

export interface NewTaskInput {
  title: string;
  description: string;
  priority: TaskPriority;
  dueDate: Date;
}

export interface DailySummary {
  countToday: number;
  highPriorityToday: number;
  tasksToday: Task[];
}

export interface StoreStats {
  totalTasks: number;
  completedTasks: number;
  pendingTasks: number;
  overdueTasks: number;
  priorityCounts: Record<TaskPriority, number>;
  fileSize: number;
}

export interface ActivityEntry {
  time: string;
  agent: AgentName;
  action: string;
}

export type ActivityLog = ActivityEntry[];

export interface OperationResult {
  op: string;
  description: string;
  success: boolean;
  error?: string;
  entityId?: string;
  messages?: string[];
}
