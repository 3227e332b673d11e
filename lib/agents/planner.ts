import crypto from 'crypto';
import { EstimatedDuration, NewTaskInput, PlannedTask } from '../../types/data';

export const TAG_VOCABULARY = ['meeting', 'call', 'email', 'report', 'review', 'urgent', 'important'] as const;

// Content length is the only signal for effort.
export function estimateDuration(title: string, description: string): EstimatedDuration {
  const contentLength = title.length + description.length;
  if (contentLength < 50) return 30;
  if (contentLength < 100) return 60;
  return 120;
}

export function extractTags(title: string, description: string): string[] {
  const content = `${title} ${description}`.toLowerCase();
  return TAG_VOCABULARY.filter((tag) => content.includes(tag));
}

export function createTask(input: NewTaskInput, now: Date = new Date()): PlannedTask {
  return {
    id: crypto.randomUUID(),
    title: input.title,
    description: input.description,
    priority: input.priority,
    dueDate: input.dueDate.toISOString(),
    createdDate: now.toISOString(),
    status: 'pending',
    estimatedDuration: estimateDuration(input.title, input.description),
    tags: extractTags(input.title, input.description),
  };
}
