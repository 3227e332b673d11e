import { z } from 'zod';

export const DateTimeStringSchema = z.string().datetime({ offset: true });

export const UUIDSchema = z.string().uuid();

export const PrioritySchema = z.enum(['Low', 'Medium', 'High']);

export const StatusSchema = z.enum(['pending', 'completed']);

export const TaskSchema = z
  .object({
    id: UUIDSchema,
    title: z.string().min(1),
    description: z.string(),
    priority: PrioritySchema,
    dueDate: DateTimeStringSchema,
    createdDate: DateTimeStringSchema,
    status: StatusSchema,
    completedDate: DateTimeStringSchema.optional(),
    estimatedDuration: z.union([z.literal(30), z.literal(60), z.literal(120)]),
    tags: z.array(z.string()),
    scheduledTime: DateTimeStringSchema,
    preparationTime: z.number().int().nonnegative(),
    bufferTime: z.number().int().nonnegative(),
    optimizationScore: z.number().optional(),
    reminderType: z.enum(['overdue', 'due_in_2h', 'due_in_1h', 'due_in_30min']).optional(),
  })
  .refine(
    (data) => (data.status === 'completed') === (data.completedDate !== undefined),
    'completedDate must be set exactly when status is "completed"'
  );

export const TasksFileSchema = z
  .array(TaskSchema)
  .refine((tasks) => new Set(tasks.map((t) => t.id)).size === tasks.length, 'Task ids must be unique');

const CreateTaskDataSchema = z.object({
  title: z.string().min(1),
  description: z.string().default(''),
  priority: PrioritySchema,
  dueDate: DateTimeStringSchema,
});

const UpdateTaskDataSchema = z.object({
  id: UUIDSchema,
  title: z.string().min(1).optional(),
  description: z.string().optional(),
  priority: PrioritySchema.optional(),
  dueDate: DateTimeStringSchema.optional(),
});

const TaskIdDataSchema = z.object({
  id: UUIDSchema,
});

const EmptyDataSchema = z.object({}).default({});

export const ProposedOperationSchema = z.discriminatedUnion('op', [
  z.object({ op: z.literal('create_task'), description: z.string().min(1), data: CreateTaskDataSchema }),
  z.object({ op: z.literal('update_task'), description: z.string().min(1), data: UpdateTaskDataSchema }),
  z.object({ op: z.literal('complete_task'), description: z.string().min(1), data: TaskIdDataSchema }),
  z.object({ op: z.literal('delete_task'), description: z.string().min(1), data: TaskIdDataSchema }),
  z.object({ op: z.literal('optimize_schedule'), description: z.string().min(1), data: EmptyDataSchema }),
  z.object({ op: z.literal('check_reminders'), description: z.string().min(1), data: EmptyDataSchema }),
]);

export type ProposedOperation = z.infer<typeof ProposedOperationSchema>;
export type ProposedOperationInput = z.input<typeof ProposedOperationSchema>;
