import crypto from 'crypto';
import { Task } from '../../types/data';

export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;

// Local wall-clock noon, so same-day checks hold in any timezone.
export const NOW = new Date(2025, 5, 10, 12, 0, 0);

export function at(offsetMs: number): string {
  return new Date(NOW.getTime() + offsetMs).toISOString();
}

export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: crypto.randomUUID(),
    title: 'Water the plants',
    description: '',
    priority: 'Medium',
    dueDate: at(DAY),
    createdDate: NOW.toISOString(),
    status: 'pending',
    estimatedDuration: 30,
    tags: [],
    scheduledTime: at(DAY - HOUR),
    preparationTime: 5,
    bufferTime: 15,
    ...overrides,
  };
}
