import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import morgan from 'morgan';

import type { AppConfig } from './config.ts';
import {
  ServiceError,
  ValidationError,
  createErrorResponse,
  describeError
} from './errors.ts';
import type { TaskService } from './services/task-service.ts';
import type { UserService } from './services/user-service.ts';

export interface AppDependencies {
  userService: UserService;
  taskService: TaskService;
  config: AppConfig;
}

// Errors raised by express.json() carry the client status and a type naming the cause
interface BodyParserError extends Error {
  status: number;
  type: string;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500 &&
    'type' in error &&
    typeof error.type === 'string'
  );
}

const BODY_ERRORS: Record<string, { message: string; errorCode: string }> = {
  'entity.parse.failed': { message: 'Request body is not valid JSON', errorCode: 'INVALID_JSON' },
  'entity.too.large': { message: 'Request body is too large', errorCode: 'PAYLOAD_TOO_LARGE' },
  'charset.unsupported': { message: 'Request body charset is not supported', errorCode: 'UNSUPPORTED_MEDIA_TYPE' },
  'encoding.unsupported': { message: 'Request body encoding is not supported', errorCode: 'UNSUPPORTED_MEDIA_TYPE' }
};

export function createApp({ userService, taskService, config }: AppDependencies) {
  const app = express();
  const includeStack = config.nodeEnv !== 'production';

  /*
    Maps service errors to their client responses and everything else to a 500
  */
  function sendError(res: Response, error: unknown, context: string) {
    if (error instanceof ValidationError) {
      return res.status(error.statusCode).json(createErrorResponse(error.message, error.issues, error.errorCode));
    }
    if (error instanceof ServiceError) {
      return res.status(error.statusCode).json(createErrorResponse(error.message, null, error.errorCode));
    }
    console.error(`${context} error:`, error);
    return res
      .status(500)
      .json(createErrorResponse('Internal server error', describeError(error, includeStack), 'INTERNAL_SERVER_ERROR'));
  }

  // Middleware setup
  app.use(cors({
    origin: config.frontendUrl,
    credentials: true,
  }));

  app.use(express.json({ limit: config.jsonBodyLimit }));

  if (config.requestLogging) {
    app.use(morgan(':method :url :status :res[content-length] - :response-time ms'));
  }

  // ===== HEALTH CHECK =====

  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      message: 'Task Manager API is running'
    });
  });

  // ===== USER ENDPOINTS =====

  /*
    Create user endpoint
    Name is trimmed, email is trimmed and lower-cased and must be unused
  */
  app.post('/api/users', async (req, res) => {
    try {
      const user = await userService.create(req.body);
      res.status(201).json({
        message: 'User created successfully',
        user
      });
    } catch (error) {
      sendError(res, error, 'Create user');
    }
  });

  app.get('/api/users', async (_req, res) => {
    try {
      const users = await userService.list();
      res.json({
        message: 'Users retrieved successfully',
        users,
        total: users.length
      });
    } catch (error) {
      sendError(res, error, 'Get users');
    }
  });

  app.get('/api/users/:user_id', async (req, res) => {
    try {
      const user = await userService.getById(req.params.user_id);
      res.json({
        message: 'User retrieved successfully',
        user
      });
    } catch (error) {
      sendError(res, error, 'Get user');
    }
  });

  /*
    Update user endpoint
    Accepts name and/or email; a changed email must not belong to another user
  */
  app.put('/api/users/:user_id', async (req, res) => {
    try {
      const user = await userService.update(req.params.user_id, req.body);
      res.json({
        message: 'User updated successfully',
        user
      });
    } catch (error) {
      sendError(res, error, 'Update user');
    }
  });

  /*
    Delete user endpoint
    Tasks referencing the user are kept
  */
  app.delete('/api/users/:user_id', async (req, res) => {
    try {
      await userService.delete(req.params.user_id);
      res.json({ message: 'User deleted successfully' });
    } catch (error) {
      sendError(res, error, 'Delete user');
    }
  });

  // ===== TASK ENDPOINTS =====

  /*
    Create task endpoint
    user_id must reference an existing user and due_date must lie in the future
  */
  app.post('/api/tasks', async (req, res) => {
    try {
      const task = await taskService.create(req.body);
      res.status(201).json({
        message: 'Task created successfully',
        task
      });
    } catch (error) {
      sendError(res, error, 'Create task');
    }
  });

  app.get('/api/tasks', async (_req, res) => {
    try {
      const tasks = await taskService.list();
      res.json({
        message: 'Tasks retrieved successfully',
        tasks,
        total: tasks.length
      });
    } catch (error) {
      sendError(res, error, 'Get tasks');
    }
  });

  /*
    Update task endpoint
    Only the fields present in the body change
  */
  app.put('/api/tasks/:task_id', async (req, res) => {
    try {
      const task = await taskService.update(req.params.task_id, req.body);
      res.json({
        message: 'Task updated successfully',
        task
      });
    } catch (error) {
      sendError(res, error, 'Update task');
    }
  });

  app.delete('/api/tasks/:task_id', async (req, res) => {
    try {
      await taskService.delete(req.params.task_id);
      res.json({ message: 'Task deleted successfully' });
    } catch (error) {
      sendError(res, error, 'Delete task');
    }
  });

  // ===== FALLBACKS =====

  app.use((req, res) => {
    res.status(404).json(createErrorResponse(`Route not found: ${req.method} ${req.path}`, null, 'ROUTE_NOT_FOUND'));
  });

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(error);
    }
    if (isBodyParserError(error)) {
      const known = BODY_ERRORS[error.type] ?? { message: error.message, errorCode: 'BAD_REQUEST' };
      return res.status(error.status).json(createErrorResponse(known.message, null, known.errorCode));
    }
    sendError(res, error, 'Request');
  });

  return app;
}
