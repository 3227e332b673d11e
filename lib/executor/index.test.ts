import fs from 'fs';
import os from 'os';
import path from 'path';
import { executeOperations, getRecentActivity } from './index';
import { TaskStore } from '../data';
import { DAY, MINUTE, NOW, at, makeTask } from '../testing/fixtures';
import { ActivityLog } from '../../types/data';

describe('executeOperations', () => {
  let tempDir: string;
  let store: TaskStore;
  let log: ActivityLog;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'taskwise-executor-test-'));
    store = new TaskStore({ filePath: path.join(tempDir, 'tasks.json'), backupDir: path.join(tempDir, 'backups') });
    log = [];
    jest.spyOn(console, 'error').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('plans, schedules and stores a new task', () => {
    const due = new Date(2025, 5, 10, 13, 30);

    const { results, allSucceeded } = executeOperations(
      store,
      [
        {
          op: 'create_task',
          description: 'Add call',
          data: { title: 'Call client', priority: 'High', dueDate: due.toISOString() },
        },
      ],
      log,
      NOW
    );

    expect(allSucceeded).toBe(true);
    const [task] = store.getAllTasks();
    expect(results).toEqual([{ op: 'create_task', description: 'Add call', success: true, entityId: task.id }]);
    expect(task).toMatchObject({
      title: 'Call client',
      description: '',
      status: 'pending',
      estimatedDuration: 30,
      tags: ['call'],
      scheduledTime: new Date(due.getTime() - 2 * 60 * MINUTE).toISOString(),
      preparationTime: 5,
      bufferTime: 15,
    });
    expect(log).toEqual([
      { time: '12:00', agent: 'Planner', action: 'Created task: Call client' },
      { time: '12:00', agent: 'Scheduler', action: 'Scheduled task for 2025-06-10 13:30' },
    ]);
  });

  it('rejects an invalid operation before touching the store', () => {
    const { results, allSucceeded } = executeOperations(
      store,
      [{ op: 'create_task', description: 'Bad', data: { title: 'x', priority: 'Urgent', dueDate: at(DAY) } }],
      log,
      NOW
    );

    expect(allSucceeded).toBe(false);
    expect(results[0].op).toBe('create_task');
    expect(results[0].description).toBe('Bad');
    expect(results[0].error).toMatch(/^data\.priority: /);
    expect(store.getAllTasks()).toEqual([]);
    expect(log).toEqual([]);
  });

  it('stops at the first failed operation', () => {
    const { results, allSucceeded } = executeOperations(
      store,
      [
        { op: 'delete_task', description: 'Remove', data: { id: makeTask().id } },
        { op: 'create_task', description: 'Add', data: { title: 'Never', priority: 'Low', dueDate: at(DAY) } },
      ],
      log,
      NOW
    );

    expect(allSucceeded).toBe(false);
    expect(results).toHaveLength(1);
    expect(results[0].success).toBe(false);
    expect(store.getAllTasks()).toEqual([]);
  });

  it('recomputes derived fields on update and drops the stale score', () => {
    const task = makeTask({ title: 'Tidy desk', priority: 'Low', optimizationScore: 7 });
    store.addTask(task);

    executeOperations(
      store,
      [
        {
          op: 'update_task',
          description: 'Edit',
          data: { id: task.id, title: 'Prepare meeting report', priority: 'High' },
        },
      ],
      log,
      NOW
    );

    const updated = store.getTaskById(task.id);
    expect(updated).toEqual({
      ...task,
      title: 'Prepare meeting report',
      priority: 'High',
      tags: ['meeting', 'report'],
      scheduledTime: new Date(Date.parse(task.dueDate) - 2 * 60 * MINUTE).toISOString(),
      preparationTime: 15,
      optimizationScore: undefined,
    });
    expect(updated).not.toHaveProperty('optimizationScore');
  });

  it('completes and deletes tasks by id', () => {
    const task = makeTask();
    store.addTask(task);

    const { allSucceeded } = executeOperations(
      store,
      [{ op: 'complete_task', description: 'Done', data: { id: task.id } }],
      log,
      NOW
    );

    expect(allSucceeded).toBe(true);
    expect(store.getTaskById(task.id)?.completedDate).toBe(NOW.toISOString());

    executeOperations(store, [{ op: 'delete_task', description: 'Remove', data: { id: task.id } }], log, NOW);
    expect(store.getAllTasks()).toEqual([]);
  });

  it('persists optimization scores and reports the ranking', () => {
    const a = makeTask({ title: 'A', priority: 'Low', dueDate: at(DAY) });
    const b = makeTask({ title: 'B', priority: 'High', dueDate: at(4 * DAY) });
    store.addTask(b);
    store.addTask(a);

    const { results } = executeOperations(store, [{ op: 'optimize_schedule', description: 'Organize' }], log, NOW);

    expect(results[0].messages).toEqual(['A (5)', 'B (4)']);
    expect(store.getTaskById(a.id)?.optimizationScore).toBe(5);
    expect(store.getTaskById(b.id)?.optimizationScore).toBe(4);
    expect(log).toEqual([
      { time: '12:00', agent: 'Scheduler', action: 'Optimized task schedule (2 tasks scored)' },
    ]);
  });

  it('leaves completed tasks unscored when re-ranking again', () => {
    const a = makeTask({ title: 'A', priority: 'Low', dueDate: at(DAY) });
    const b = makeTask({ title: 'B', priority: 'High', dueDate: at(4 * DAY) });
    store.addTask(a);
    store.addTask(b);

    const { results } = executeOperations(
      store,
      [
        { op: 'optimize_schedule', description: 'Organize' },
        { op: 'complete_task', description: 'Done', data: { id: a.id } },
        { op: 'optimize_schedule', description: 'Organize again' },
      ],
      log,
      NOW
    );

    expect(results[2].messages).toEqual(['B (4)', 'A']);
    expect(store.getTaskById(a.id)).not.toHaveProperty('optimizationScore');
    expect(store.getTaskById(b.id)?.optimizationScore).toBe(4);
    expect(log[log.length - 1]).toEqual({
      time: '12:00',
      agent: 'Scheduler',
      action: 'Optimized task schedule (1 tasks scored)',
    });
  });

  it('saves no scores when the write fails', () => {
    const a = makeTask({ title: 'A', priority: 'Low', dueDate: at(DAY) });
    const b = makeTask({ title: 'B', priority: 'High', dueDate: at(4 * DAY) });
    store.addTask(a);
    store.addTask(b);
    jest.spyOn(fs, 'renameSync').mockImplementationOnce(() => {
      throw new Error('disk full');
    });

    const { results, allSucceeded } = executeOperations(
      store,
      [{ op: 'optimize_schedule', description: 'Organize' }],
      log,
      NOW
    );

    expect(allSucceeded).toBe(false);
    expect(results[0].error).toBe('Failed to save scores for 2 task(s)');
    expect(store.getAllTasks().map((t) => [t.title, t.optimizationScore])).toEqual([
      ['A', undefined],
      ['B', undefined],
    ]);
    expect(log).toEqual([]);
  });

  it('returns reminder messages', () => {
    store.addTask(makeTask({ title: 'Pay rent', dueDate: at(-90 * MINUTE) }));
    store.addTask(makeTask({ title: 'Relax', dueDate: at(3 * DAY) }));

    const { results } = executeOperations(
      store,
      [{ op: 'check_reminders', description: 'Check', data: {} }],
      log,
      NOW
    );

    expect(results[0].messages).toEqual(["OVERDUE: 'Pay rent' was due 1h 30m ago"]);
    expect(log).toEqual([{ time: '12:00', agent: 'Reminder', action: 'Checked 1 reminders' }]);
  });
});

describe('getRecentActivity', () => {
  it('returns the most recent entries', () => {
    const log: ActivityLog = Array.from({ length: 12 }, (_, i) => ({
      time: '09:00',
      agent: 'Planner' as const,
      action: `entry ${i}`,
    }));

    expect(getRecentActivity(log).map((e) => e.action)).toEqual(
      Array.from({ length: 10 }, (_, i) => `entry ${i + 2}`)
    );
    expect(getRecentActivity(log, 2).map((e) => e.action)).toEqual(['entry 10', 'entry 11']);
  });
});
