import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('8000').transform(Number),
  DATABASE_URL: z.string().url(),
  ANTHROPIC_API_KEY: z.string().optional(),
  CLASSIFIER_MODEL: z.string().default('claude-haiku-4-5-20251001'),
  CLASSIFICATION_CACHE_SIZE: z.string().default('1000').transform(Number).pipe(z.number().int().positive()),
  CORS_ORIGIN: z.string().default('*'),
  JIRA_TOKEN: z.string().optional(),
  JIRA_PROJECT_KEY: z.string().default('SUPP'),
  FRESHSERVICE_TOKEN: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('❌ Invalid environment variables:');
    console.error(result.error.format());
    process.exit(1);
  }
  return result.data;
}

export const env = validateEnv();
