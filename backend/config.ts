import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  DATA_FILE_PATH: z.string().min(1).default('storage/data.json'),
  FRONTEND_URL: z.string().min(1).default('http://localhost:5173'),
  JSON_BODY_LIMIT: z.string().min(1).default('1mb'),
  NODE_ENV: z.string().min(1).default('development'),
  REQUEST_LOGGING: z.enum(['true', 'false']).default('true')
});

export interface AppConfig {
  port: number;
  host: string;
  dataFilePath: string;
  frontendUrl: string;
  jsonBodyLimit: string;
  nodeEnv: string;
  requestLogging: boolean;
}

/*
  Reads the server settings from the environment.
  Empty variables count as unset; a malformed value throws naming the variable.
*/
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment configuration (${problems})`);
  }

  const {
    PORT,
    HOST,
    DATA_FILE_PATH,
    FRONTEND_URL,
    JSON_BODY_LIMIT,
    NODE_ENV,
    REQUEST_LOGGING
  } = result.data;

  return {
    port: PORT,
    host: HOST,
    dataFilePath: DATA_FILE_PATH,
    frontendUrl: FRONTEND_URL,
    jsonBodyLimit: JSON_BODY_LIMIT,
    nodeEnv: NODE_ENV,
    requestLogging: REQUEST_LOGGING === 'true'
  };
}
