import { z } from 'zod';

import { ValidationError, type FieldIssue } from './errors.ts';

/*
  Stored records

  User:
    - id: string (uuid)
    - name: string
    - email: string
    - created_at: timestamp
  Task:
    - id: string (uuid)
    - user_id: string (uuid)
    - title: string
    - description: string (nullable)
    - priority: integer 1..5
    - status: pending | in_progress | done
    - due_date: timestamp
    - created_at: timestamp
    - updated_at: timestamp

  Timestamps are ISO-8601 UTC strings.
*/

export const TASK_STATUSES = ['pending', 'in_progress', 'done'] as const;

export const taskStatusSchema = z.enum(TASK_STATUSES);

export const userSchema = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
  created_at: z.string()
});

export const taskSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  title: z.string(),
  description: z.string().nullable().default(null),
  priority: z.number().int(),
  status: taskStatusSchema,
  due_date: z.string(),
  created_at: z.string(),
  updated_at: z.string()
});

// Outer layout only; records are checked one by one when the document is loaded
export const documentLayoutSchema = z.object({
  users: z.array(z.unknown()).default([]),
  tasks: z.array(z.unknown()).default([])
});

export type User = z.infer<typeof userSchema>;
export type Task = z.infer<typeof taskSchema>;
export type TaskStatus = z.infer<typeof taskStatusSchema>;

export interface DataDocument {
  users: User[];
  tasks: Task[];
}

// ===== FIELD RULES =====

const TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2})(?:[Tt ](\d{2}:\d{2})(?::(\d{2})(?:\.(\d+))?)?([Zz]|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Parses an ISO-8601 date or date-time. A value without an offset is read as UTC.
 * Returns null when the value is not a valid timestamp.
 */
export function parseTimestamp(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, date, time, seconds, fraction, offset] = match;
  const millis = (fraction ?? '').padEnd(3, '0').slice(0, 3);

  let zone = 'Z';
  if (offset && offset.toUpperCase() !== 'Z') {
    zone = offset.includes(':') ? offset : `${offset.slice(0, 3)}:${offset.slice(3)}`;
  }

  // The calendar date is checked on its own, before any offset moves it to another day.
  // Date rolls impossible days such as February 30th over into the next month.
  const calendarDay = new Date(`${date}T00:00:00.000Z`);
  if (Number.isNaN(calendarDay.getTime()) || calendarDay.toISOString().slice(0, 10) !== date) {
    return null;
  }

  const parsed = new Date(`${date}T${time ?? '00:00'}:${seconds ?? '00'}.${millis}${zone}`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

function normalizeDescription(value: string | null): string | null {
  if (value === null) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

/*
  Trimmed text whose length is counted in characters (code points), so an
  emoji counts once rather than as its two UTF-16 units
*/
function boundedText(label: string, min: number, max: number) {
  return z
    .string({ required_error: `${label} is required`, invalid_type_error: `${label} must be a string` })
    .trim()
    .min(1, `${label} cannot be empty or whitespace`)
    .superRefine((value, ctx) => {
      const length = [...value].length;
      if (length < min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} must be at least ${min} characters` });
      } else if (length > max) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} must be at most ${max} characters` });
      }
    });
}

const nameSchema = boundedText('Name', 2, 100);

const emailSchema = z
  .string({ required_error: 'Email is required', invalid_type_error: 'Email must be a string' })
  .trim()
  .toLowerCase()
  .email('Invalid email address');

const titleSchema = boundedText('Title', 3, 200);

const descriptionSchema = z.string({ invalid_type_error: 'Description must be a string' }).nullable();

const prioritySchema = z
  .number({ required_error: 'Priority is required', invalid_type_error: 'Priority must be an integer' })
  .int('Priority must be an integer')
  .min(1, 'Priority must be between 1 and 5')
  .max(5, 'Priority must be between 1 and 5');

const statusSchema = z.enum(TASK_STATUSES, { required_error: 'Status is required' });

// The "now" used here is read at validation time, so the schema stays reusable
const dueDateSchema = z
  .string({ required_error: 'Due date is required', invalid_type_error: 'Due date must be an ISO-8601 string' })
  .transform((value, ctx) => {
    const parsed = parseTimestamp(value);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Due date must be a valid ISO-8601 timestamp' });
      return z.NEVER;
    }
    if (parsed.getTime() <= Date.now()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Due date must be a future datetime' });
      return z.NEVER;
    }
    return parsed.toISOString();
  });

const userIdSchema = z
  .string({ required_error: 'User ID is required', invalid_type_error: 'User ID must be a string' })
  .trim()
  .toLowerCase()
  .uuid('User ID must be a valid UUID');

// ===== INPUT SCHEMAS =====

export const createUserInputSchema = z.object({
  name: nameSchema,
  email: emailSchema
});

export const updateUserInputSchema = z.object({
  name: nameSchema.optional(),
  email: emailSchema.optional()
});

export const createTaskInputSchema = z.object({
  user_id: userIdSchema,
  title: titleSchema,
  description: descriptionSchema.optional().transform((value) => normalizeDescription(value ?? null)),
  priority: prioritySchema.default(3),
  status: statusSchema,
  due_date: dueDateSchema
});

export const updateTaskInputSchema = z.object({
  title: titleSchema.optional(),
  description: descriptionSchema
    .optional()
    .transform((value) => (value === undefined ? undefined : normalizeDescription(value))),
  priority: prioritySchema.optional(),
  status: statusSchema.optional(),
  due_date: dueDateSchema.optional()
});

export type CreateUserInput = z.infer<typeof createUserInputSchema>;
export type UpdateUserInput = z.infer<typeof updateUserInputSchema>;
export type CreateTaskInput = z.infer<typeof createTaskInputSchema>;
export type UpdateTaskInput = z.infer<typeof updateTaskInputSchema>;

function toFieldIssues(error: z.ZodError): FieldIssue[] {
  const seen = new Set<string>();
  const issues: FieldIssue[] = [];

  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'payload';
    // One message per field, the first rule it broke
    if (seen.has(field)) {
      continue;
    }
    seen.add(field);
    issues.push({ field, message: issue.message });
  }

  return issues;
}

/**
 * Runs a payload through a schema and returns the normalized value,
 * or throws a ValidationError naming every offending field.
 */
export function validate<Output, Input>(schema: z.ZodType<Output, z.ZodTypeDef, Input>, payload: unknown): Output {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new ValidationError(toFieldIssues(result.error));
  }
  return result.data;
}
