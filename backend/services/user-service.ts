import { randomUUID } from 'node:crypto';

import { DuplicateEmailError, NotFoundError } from '../errors.ts';
import {
  createUserInputSchema,
  updateUserInputSchema,
  validate,
  type User
} from '../schema.ts';
import type { JsonDocumentStore } from '../store.ts';

export class UserService {
  constructor(private readonly store: JsonDocumentStore) {}

  async create(payload: unknown): Promise<User> {
    const input = validate(createUserInputSchema, payload);

    return this.store.update((document) => {
      if (document.users.some((user) => user.email.toLowerCase() === input.email)) {
        throw new DuplicateEmailError(input.email);
      }

      const user: User = {
        id: randomUUID(),
        name: input.name,
        email: input.email,
        created_at: new Date().toISOString()
      };
      document.users.push(user);
      return user;
    });
  }

  list(): Promise<User[]> {
    return this.store.read((document) => document.users);
  }

  getById(id: string): Promise<User> {
    return this.store.read((document) => {
      const user = document.users.find((candidate) => candidate.id === id);
      if (!user) {
        throw new NotFoundError('user', id);
      }
      return user;
    });
  }

  /*
    Applies the supplied name/email. A new email must not belong to another user.
  */
  async update(id: string, payload: unknown): Promise<User> {
    const input = validate(updateUserInputSchema, payload);

    return this.store.update((document) => {
      const user = document.users.find((candidate) => candidate.id === id);
      if (!user) {
        throw new NotFoundError('user', id);
      }

      if (input.email !== undefined) {
        const email = input.email;
        if (document.users.some((other) => other.id !== id && other.email.toLowerCase() === email)) {
          throw new DuplicateEmailError(email);
        }
        user.email = email;
      }
      if (input.name !== undefined) {
        user.name = input.name;
      }
      return user;
    });
  }

  // Tasks owned by the user are left in place
  delete(id: string): Promise<boolean> {
    return this.store.update((document) => {
      const index = document.users.findIndex((user) => user.id === id);
      if (index === -1) {
        throw new NotFoundError('user', id);
      }
      document.users.splice(index, 1);
      return true;
    });
  }
}
