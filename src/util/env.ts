import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LETTERBOXD_BASE_URL: z.string().url().default('https://letterboxd.com'),
  LETTERBOXD_USERNAME: z.string().optional(),
  LETTERBOXD_PASSWORD: z.string().optional(),
  DATA_DIR: z.string().default('./data'),
  CACHE_FILE: z.string().default('cache.sqlite'),
  EXPORT_DIR: z.string().optional(),
  ENRICH_CONCURRENCY: z.string().default('8').transform(Number).pipe(z.number().int().positive()),
  REQUEST_TIMEOUT_MS: z.string().optional().transform(val => val ? Number(val) : undefined).pipe(z.number().int().positive().optional()),
}).refine(data => {
  // Credentials come as a pair or not at all
  return (data.LETTERBOXD_USERNAME === undefined) === (data.LETTERBOXD_PASSWORD === undefined);
}, {
  message: 'LETTERBOXD_USERNAME and LETTERBOXD_PASSWORD must be set together.',
  path: ['LETTERBOXD_USERNAME']
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): ReturnType<typeof envSchema.safeParse> {
  return envSchema.safeParse(source);
}

function validateEnv(): Env {
  const result = parseEnv(process.env);

  if (!result.success) {
    console.error('Environment validation failed:');
    result.error.issues.forEach(error => {
      console.error(`- ${error.path.join('.')}: ${error.message}`);
    });
    process.exit(1);
  }

  return Object.freeze(result.data);
}

const env = validateEnv();
export default env;
