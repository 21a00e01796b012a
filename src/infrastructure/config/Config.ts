import path from 'node:path';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().min(1).default('0.0.0.0'),
  DATA_DIR: z.string().min(1).default('data'),
  FRONTEND_DIR: z.string().min(1).default('frontend'),
  STORAGE_DRIVER: z.enum(['json', 'memory']).default('json'),
  SEED_DEMO_DATA: booleanFlag,
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV: z.string().min(1).default('development'),
});

export interface AppConfig {
  server: {
    port: number;
    host: string;
  };
  storage: {
    driver: 'json' | 'memory';
    dataDir: string;
    seedDemoData: boolean;
  };
  frontend: {
    dir: string;
  };
  logging: {
    level: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  };
  environment: string;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;

  return {
    server: {
      port: values.PORT,
      host: values.HOST,
    },
    storage: {
      driver: values.STORAGE_DRIVER,
      dataDir: path.resolve(cwd, values.DATA_DIR),
      seedDemoData: values.SEED_DEMO_DATA,
    },
    frontend: {
      dir: path.resolve(cwd, values.FRONTEND_DIR),
    },
    logging: {
      level: values.LOG_LEVEL,
    },
    environment: values.NODE_ENV,
  };
};
