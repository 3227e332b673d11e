export * from '../types/data';
export { TaskStore } from './data';
export type { TaskStoreOptions } from './data';
export { createTask, estimateDuration, extractTags, TAG_VOCABULARY } from './agents/planner';
export {
  scheduleTask,
  optimizeSchedule,
  scoreTask,
  calculateOptimalTime,
  calculatePrepTime,
  BUFFER_TIME_MINUTES,
} from './agents/scheduler';
export {
  checkReminders,
  classifyReminder,
  createReminderMessage,
  getDailySummary,
  REMINDER_THRESHOLDS,
} from './agents/reminder';
export { filterTasks, sortTasks } from './agents/listing';
export type { TaskFilter, TaskSortKey } from './agents/listing';
export { executeOperations, getRecentActivity } from './executor';
export { ProposedOperationSchema, TaskSchema, TasksFileSchema } from './validation/schemas';
export type { ProposedOperation, ProposedOperationInput } from './validation/schemas';
export { getStoreConfig } from './config';
export type { StoreConfig } from './config';
