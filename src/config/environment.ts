import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
config();

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((val) => val === 'true');

// Define environment variable schema with Zod for type-safe validation
const envSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging configuration
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // Start the inventory with breakage recording already switched on
  FLAG_BREAKAGE_ON_START: booleanFlag,
});

export type Environment = z.infer<typeof envSchema>;

/**
 * Validate a raw environment map.
 *
 * Throws with the formatted zod error when a variable is present but malformed.
 */
export function parseEnvironment(source: NodeJS.ProcessEnv): Environment {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    throw new Error(
      `❌ Invalid environment variables: ${JSON.stringify(parsed.error.format(), null, 2)}`
    );
  }

  return parsed.data;
}

// Export validated environment variables
export const env = parseEnvironment(process.env);
