import { randomUUID } from 'node:crypto';

import { NotFoundError, UnknownUserError } from '../errors.ts';
import {
  createTaskInputSchema,
  updateTaskInputSchema,
  validate,
  type Task
} from '../schema.ts';
import type { JsonDocumentStore } from '../store.ts';

// Later than both the clock and the previous value, even within the same millisecond
function nextTimestamp(previous: string): string {
  const previousTime = Date.parse(previous);
  const now = Date.now();
  return new Date(Number.isNaN(previousTime) ? now : Math.max(now, previousTime + 1)).toISOString();
}

export class TaskService {
  constructor(private readonly store: JsonDocumentStore) {}

  /**
   * Creates a task for an existing user.
   * The owner is checked once here; later user deletions leave the task as is.
   */
  async create(payload: unknown): Promise<Task> {
    const input = validate(createTaskInputSchema, payload);

    return this.store.update((document) => {
      if (!document.users.some((user) => user.id === input.user_id)) {
        throw new UnknownUserError(input.user_id);
      }

      const now = new Date().toISOString();
      const task: Task = {
        id: randomUUID(),
        user_id: input.user_id,
        title: input.title,
        description: input.description,
        priority: input.priority,
        status: input.status,
        due_date: input.due_date,
        created_at: now,
        updated_at: now
      };
      document.tasks.push(task);
      return task;
    });
  }

  list(): Promise<Task[]> {
    return this.store.read((document) => document.tasks);
  }

  /**
   * Applies only the fields present in the payload and refreshes updated_at.
   */
  async update(id: string, payload: unknown): Promise<Task> {
    const changes = validate(updateTaskInputSchema, payload);

    return this.store.update((document) => {
      const task = document.tasks.find((candidate) => candidate.id === id);
      if (!task) {
        throw new NotFoundError('task', id);
      }

      if (changes.title !== undefined) {
        task.title = changes.title;
      }
      if (changes.description !== undefined) {
        task.description = changes.description;
      }
      if (changes.priority !== undefined) {
        task.priority = changes.priority;
      }
      if (changes.status !== undefined) {
        task.status = changes.status;
      }
      if (changes.due_date !== undefined) {
        task.due_date = changes.due_date;
      }
      task.updated_at = nextTimestamp(task.updated_at);
      return task;
    });
  }

  delete(id: string): Promise<boolean> {
    return this.store.update((document) => {
      const index = document.tasks.findIndex((task) => task.id === id);
      if (index === -1) {
        throw new NotFoundError('task', id);
      }
      document.tasks.splice(index, 1);
      return true;
    });
  }
}
