import { z } from 'zod';

export const APP_CONFIG = Symbol('APP_CONFIG');

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DB_DRIVER: z.enum(['postgres', 'better-sqlite3']).default('postgres'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USERNAME: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  DB_NAME: z.string().default('critique'),
  DB_SYNCHRONIZE: booleanString.default('true'),
  JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),
  JWT_EXPIRES_IN: z.string().default('1d'),
  CONFIRMATION_CODE_TTL_MINUTES: z.coerce.number().int().positive().default(15),
  MAIL_FROM: z.string().default('noreply@critique.local'),
  IMPORT_DIR: z.string().default('static/data'),
});

export type DatabaseDriver = 'postgres' | 'better-sqlite3';

export interface AppConfig {
  port: number;
  database: {
    driver: DatabaseDriver;
    host: string;
    port: number;
    username: string;
    password: string;
    name: string;
    synchronize: boolean;
  };
  auth: {
    jwtSecret: string;
    jwtExpiresIn: string;
    codeTtlMinutes: number;
  };
  mail: {
    from: string;
  };
  importDir: string;
}

/**
 * Validates the process environment and folds it into the typed config tree.
 * Throws with every offending key listed when something is missing or malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    database: {
      driver: vars.DB_DRIVER,
      host: vars.DB_HOST,
      port: vars.DB_PORT,
      username: vars.DB_USERNAME,
      password: vars.DB_PASSWORD,
      name: vars.DB_NAME,
      synchronize: vars.DB_SYNCHRONIZE,
    },
    auth: {
      jwtSecret: vars.JWT_SECRET,
      jwtExpiresIn: vars.JWT_EXPIRES_IN,
      codeTtlMinutes: vars.CONFIRMATION_CODE_TTL_MINUTES,
    },
    mail: {
      from: vars.MAIL_FROM,
    },
    importDir: vars.IMPORT_DIR,
  };
}
