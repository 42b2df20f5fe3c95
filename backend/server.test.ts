import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import request from 'supertest';

import { loadConfig } from './config.ts';
import { createApp } from './server.ts';
import { TaskService } from './services/task-service.ts';
import { UserService } from './services/user-service.ts';
import { JsonDocumentStore } from './store.ts';

let dir: string;

function buildApp(dataFilePath: string, nodeEnv = 'test', env: NodeJS.ProcessEnv = {}) {
  const config = loadConfig({ DATA_FILE_PATH: dataFilePath, REQUEST_LOGGING: 'false', NODE_ENV: nodeEnv, ...env });
  const store = new JsonDocumentStore(config.dataFilePath);
  return createApp({
    userService: new UserService(store),
    taskService: new TaskService(store),
    config
  });
}

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'task-api-'));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

describe("Health check", () => {
  it("reports the API as running", async () => {
    const response = await request(buildApp(path.join(dir, 'data.json'))).get("/api/health");
    expect(response.statusCode).toBe(200);
    expect(response.body).toHaveProperty('status', 'ok');
  });
});

describe("User API Endpoints", () => {
  describe("POST /api/users", () => {
    it("should create a normalized user", async () => {
      const app = buildApp(path.join(dir, 'data.json'));
      const response = await request(app).post("/api/users").send({ name: " Ann ", email: "ANN@X.COM" });

      expect(response.statusCode).toBe(201);
      expect(response.body.user).toMatchObject({ name: 'Ann', email: 'ann@x.com' });
    });

    it("should reject a duplicate email", async () => {
      const app = buildApp(path.join(dir, 'data.json'));
      await request(app).post("/api/users").send({ name: "Ann", email: "ann@x.com" });

      const response = await request(app).post("/api/users").send({ name: "Ann Two", email: "Ann@x.com" });
      expect(response.statusCode).toBe(400);
      expect(response.body).toMatchObject({ success: false, error_code: 'EMAIL_ALREADY_REGISTERED' });
    });

    it("should report validation failures per field", async () => {
      const app = buildApp(path.join(dir, 'data.json'));
      const response = await request(app).post("/api/users").send({ name: "Ann", email: "nope" });

      expect(response.statusCode).toBe(400);
      expect(response.body.error_code).toBe('VALIDATION_ERROR');
      expect(response.body.details).toEqual([{ field: 'email', message: 'Invalid email address' }]);
    });

    it("should reject a malformed JSON body", async () => {
      const app = buildApp(path.join(dir, 'data.json'));
      const response = await request(app)
        .post("/api/users")
        .set("Content-Type", "application/json")
        .send('{"name":');

      expect(response.statusCode).toBe(400);
      expect(response.body.error_code).toBe('INVALID_JSON');
    });

    it("should answer 413 for a body over the configured limit", async () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const app = buildApp(path.join(dir, 'data.json'), 'test', { JSON_BODY_LIMIT: '100b' });

      const response = await request(app).post("/api/users").send({ name: "a".repeat(500), email: "ann@x.com" });

      expect(response.statusCode).toBe(413);
      expect(response.body).toMatchObject({ success: false, error_code: 'PAYLOAD_TOO_LARGE' });
      expect(consoleError).not.toHaveBeenCalled();
    });

    it("should answer 415 for an unsupported charset", async () => {
      const app = buildApp(path.join(dir, 'data.json'));
      const response = await request(app)
        .post("/api/users")
        .set("Content-Type", "application/json; charset=iso-8859-1")
        .send('{"name":"Ann","email":"ann@x.com"}');

      expect(response.statusCode).toBe(415);
      expect(response.body.error_code).toBe('UNSUPPORTED_MEDIA_TYPE');
    });
  });

  describe("GET /api/users", () => {
    it("should return every user with a total", async () => {
      const app = buildApp(path.join(dir, 'data.json'));
      await request(app).post("/api/users").send({ name: "Ann", email: "ann@x.com" });
      await request(app).post("/api/users").send({ name: "Bob", email: "bob@x.com" });

      const response = await request(app).get("/api/users");
      expect(response.statusCode).toBe(200);
      expect(response.body.total).toBe(2);
      expect(response.body.users.map((user: { name: string }) => user.name)).toEqual(['Ann', 'Bob']);
    });
  });

  describe("GET /api/users/:user_id", () => {
    it("should return a user's details", async () => {
      const app = buildApp(path.join(dir, 'data.json'));
      const created = await request(app).post("/api/users").send({ name: "Ann", email: "ann@x.com" });

      const response = await request(app).get(`/api/users/${created.body.user.id}`);
      expect(response.statusCode).toBe(200);
      expect(response.body.user).toEqual(created.body.user);
    });

    it("should return 404 for non-existent user", async () => {
      const response = await request(buildApp(path.join(dir, 'data.json'))).get("/api/users/nonexistent");
      expect(response.statusCode).toBe(404);
      expect(response.body.error_code).toBe('USER_NOT_FOUND');
    });
  });

  describe("PUT /api/users/:user_id", () => {
    it("should update the supplied fields", async () => {
      const app = buildApp(path.join(dir, 'data.json'));
      const created = await request(app).post("/api/users").send({ name: "Ann", email: "ann@x.com" });

      const response = await request(app).put(`/api/users/${created.body.user.id}`).send({ name: "Ann Lee" });
      expect(response.statusCode).toBe(200);
      expect(response.body.user).toEqual({ ...created.body.user, name: 'Ann Lee' });
    });
  });

  describe("DELETE /api/users/:user_id", () => {
    it("should delete a user and keep their tasks", async () => {
      const app = buildApp(path.join(dir, 'data.json'));
      const user = await request(app).post("/api/users").send({ name: "Ann", email: "ann@x.com" });
      await request(app).post("/api/tasks").send({
        user_id: user.body.user.id,
        title: "Orphan me",
        status: "pending",
        due_date: "2099-01-01T00:00:00Z"
      });

      const response = await request(app).delete(`/api/users/${user.body.user.id}`);
      expect(response.statusCode).toBe(200);

      const tasks = await request(app).get("/api/tasks");
      expect(tasks.body.total).toBe(1);
      expect(tasks.body.tasks[0].user_id).toBe(user.body.user.id);
    });

    it("should return 404 for deleting non-existent user", async () => {
      const response = await request(buildApp(path.join(dir, 'data.json'))).delete("/api/users/nonexistent");
      expect(response.statusCode).toBe(404);
    });
  });
});

describe("Task API Endpoints", () => {
  async function createOwner(app: ReturnType<typeof buildApp>): Promise<string> {
    const response = await request(app).post("/api/users").send({ name: "Ann", email: "ann@x.com" });
    return response.body.user.id;
  }

  describe("POST /api/tasks", () => {
    it("should create a task with defaults applied", async () => {
      const app = buildApp(path.join(dir, 'data.json'));
      const userId = await createOwner(app);

      const response = await request(app).post("/api/tasks").send({
        user_id: userId,
        title: "  Write report ",
        description: "   ",
        status: "pending",
        due_date: "2099-01-01T10:00:00"
      });

      expect(response.statusCode).toBe(201);
      expect(response.body.task).toMatchObject({
        user_id: userId,
        title: 'Write report',
        description: null,
        priority: 3,
        status: 'pending',
        due_date: '2099-01-01T10:00:00.000Z'
      });
      expect(response.body.task.updated_at).toBe(response.body.task.created_at);
    });

    it("should reject a task for an unknown user", async () => {
      const response = await request(buildApp(path.join(dir, 'data.json'))).post("/api/tasks").send({
        user_id: "3f1c1e0a-5b7d-4c2e-9a8b-1d2e3f4a5b6c",
        title: "Write report",
        status: "pending",
        due_date: "2099-01-01T10:00:00Z"
      });

      expect(response.statusCode).toBe(400);
      expect(response.body.error_code).toBe('UNKNOWN_USER');
    });

    it("should reject a due date in the past", async () => {
      const app = buildApp(path.join(dir, 'data.json'));
      const userId = await createOwner(app);

      const response = await request(app).post("/api/tasks").send({
        user_id: userId,
        title: "Write report",
        status: "pending",
        due_date: "2000-01-01T00:00:00Z"
      });

      expect(response.statusCode).toBe(400);
      expect(response.body.details).toEqual([{ field: 'due_date', message: 'Due date must be a future datetime' }]);
    });
  });

  describe("PUT /api/tasks/:task_id", () => {
    it("should update only the supplied fields", async () => {
      const app = buildApp(path.join(dir, 'data.json'));
      const userId = await createOwner(app);
      const created = await request(app).post("/api/tasks").send({
        user_id: userId,
        title: "Write report",
        priority: 1,
        status: "pending",
        due_date: "2099-01-01T10:00:00Z"
      });

      const response = await request(app).put(`/api/tasks/${created.body.task.id}`).send({ status: "done" });
      expect(response.statusCode).toBe(200);
      expect(response.body.task).toMatchObject({ title: 'Write report', priority: 1, status: 'done' });
    });

    it("should return 404 for non-existent task update", async () => {
      const response = await request(buildApp(path.join(dir, 'data.json')))
        .put("/api/tasks/nonexistent")
        .send({ status: "done" });

      expect(response.statusCode).toBe(404);
      expect(response.body.error_code).toBe('TASK_NOT_FOUND');
    });
  });

  describe("DELETE /api/tasks/:task_id", () => {
    it("should delete a task and then report it missing", async () => {
      const app = buildApp(path.join(dir, 'data.json'));
      const userId = await createOwner(app);
      const created = await request(app).post("/api/tasks").send({
        user_id: userId,
        title: "Write report",
        status: "pending",
        due_date: "2099-01-01T10:00:00Z"
      });

      const first = await request(app).delete(`/api/tasks/${created.body.task.id}`);
      expect(first.statusCode).toBe(200);
      expect(first.body).toEqual({ message: 'Task deleted successfully' });

      const second = await request(app).delete(`/api/tasks/${created.body.task.id}`);
      expect(second.statusCode).toBe(404);
    });
  });
});

describe("Fallbacks", () => {
  it("answers unknown routes with 404", async () => {
    const response = await request(buildApp(path.join(dir, 'data.json'))).get("/api/projects");
    expect(response.statusCode).toBe(404);
    expect(response.body.error_code).toBe('ROUTE_NOT_FOUND');
  });

  it("answers storage failures with 500 and hides the stack in production", async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    // A directory cannot be read as the data file
    const response = await request(buildApp(dir, 'production')).get("/api/users");

    expect(response.statusCode).toBe(500);
    expect(response.body.error_code).toBe('INTERNAL_SERVER_ERROR');
    expect(response.body.details.stack).toBeUndefined();
    expect(consoleError).toHaveBeenCalledTimes(1);
  });
});
