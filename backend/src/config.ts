import path from 'node:path';
import { z } from 'zod';

const envSchema = z.object({
  POSTGRES_HOST: z.string().min(1).default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_USER: z.string().min(1).default('payroll'),
  POSTGRES_PASSWORD: z.string().default('payroll'),
  POSTGRES_DB: z.string().min(1).default('payrolldb'),
  API_PORT: z.coerce.number().int().min(0).default(8080),
  IMPORT_PATH: z.string().min(1).optional(),
  EXPORT_PATH: z.string().min(1).optional(),
  IMPORT_MAX_FILES: z.coerce.number().int().positive().default(50),
  IMPORT_MAX_FILE_SIZE: z.coerce.number().int().positive().default(50 * 1024 * 1024),
});

export type DatabaseConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
};

export type AppConfig = {
  database: DatabaseConfig;
  api: { port: number };
  paths: {
    importRoot: string;
    exportRoot: string;
  };
  uploads: {
    maxFiles: number;
    maxFileSize: number;
  };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    database: {
      host: parsed.POSTGRES_HOST,
      port: parsed.POSTGRES_PORT,
      user: parsed.POSTGRES_USER,
      password: parsed.POSTGRES_PASSWORD,
      database: parsed.POSTGRES_DB,
    },
    api: { port: parsed.API_PORT },
    paths: {
      importRoot: path.resolve(cwd, parsed.IMPORT_PATH ?? 'imports'),
      exportRoot: path.resolve(cwd, parsed.EXPORT_PATH ?? 'exports'),
    },
    uploads: {
      maxFiles: parsed.IMPORT_MAX_FILES,
      maxFileSize: parsed.IMPORT_MAX_FILE_SIZE,
    },
  };
}
