import * as dotenv from 'dotenv';

import { loadConfig } from './config.ts';
import { createApp } from './server.ts';
import { TaskService } from './services/task-service.ts';
import { UserService } from './services/user-service.ts';
import { JsonDocumentStore } from './store.ts';

dotenv.config();

const config = loadConfig();

// One store and one pair of services for the whole process, handed to the router
const store = new JsonDocumentStore(config.dataFilePath);
const app = createApp({
  userService: new UserService(store),
  taskService: new TaskService(store),
  config
});

app.listen(config.port, config.host, () => {
  console.log(`Server running on port ${config.port} and listening on ${config.host}`);
  console.log(`Environment: ${config.nodeEnv}`);
  console.log(`Data file: ${store.filePath}`);
});
