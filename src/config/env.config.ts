import { z } from 'zod';
import dotenv from 'dotenv';
import { ValidationException } from '../utils/exceptions';

// Load environment variables
dotenv.config();

const positiveInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive());

// Define the schema for environment variables
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Engine limits
  COMMAND_HISTORY_LIMIT: positiveInt('100'),
  EVENT_HISTORY_LIMIT: positiveInt('1000'),

  // Optional upper bound for a single async event handler.
  // Unset means handlers are never timed out by the dispatcher.
  HANDLER_TIMEOUT_MS: z
    .string()
    .optional()
    .transform((val) => (val ? parseInt(val, 10) : undefined))
    .pipe(z.number().int().positive().optional()),

  // Persistence. Without DATABASE_URL game state is kept in memory.
  DATABASE_URL: z.string().min(1).optional(),
  DB_POOL_SIZE: z
    .string()
    .optional()
    .transform((val) => (val ? parseInt(val, 10) : 5)),
});

// Parse and validate environment variables
const parseEnv = () => {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((issue) => {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      });
      throw new ValidationException('Invalid environment configuration');
    }
    throw error;
  }
};

// Export validated environment variables
export const env = parseEnv();

// Type for environment variables
export type Env = z.infer<typeof envSchema>;
