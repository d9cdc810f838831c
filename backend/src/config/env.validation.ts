import { z } from 'zod';

const truthyValues = new Set(['true', '1', 'yes', 'y', 'on']);

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

export const envSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'test', 'production'])
      .default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    AI_PROVIDER: z.enum(['openai']).default('openai'),
    OPENAI_API_KEY: z.string().trim().optional(),
    OPENAI_CHAT_MODEL: z.string().trim().default('gpt-4o-mini'),
    OPENAI_EMBEDDING_MODEL: z.string().trim().default('text-embedding-3-small'),
    OPENAI_TRANSCRIPTION_MODEL: z.string().trim().default('whisper-1'),
    DATABASE_URL: z.string().trim().optional(),
    DATABASE_SSL: z
      .preprocess((value) => {
        if (typeof value === 'string') {
          const normalized = value.trim().toLowerCase();
          if (normalized.length === 0) {
            return undefined;
          }
          return truthyValues.has(normalized);
        }
        if (typeof value === 'number') {
          return value === 1;
        }
        return value;
      }, z.boolean().optional())
      .optional(),
    DOCUMENTS_DIR: z.string().trim().min(1).default('data/documents'),
    CHUNK_SIZE: z.coerce.number().int().positive().default(800),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
    SEARCH_TOP_K: z.coerce.number().int().positive().default(5),
    MAX_TOOL_ROUNDS: z.coerce.number().int().positive().default(5),
    TIMEZONE: z
      .string()
      .trim()
      .min(1)
      .refine(isTimeZone, 'TIMEZONE must be an IANA time zone')
      .default('UTC'),
    GOOGLE_CALENDAR_TOKEN_PATH: z
      .string()
      .trim()
      .min(1)
      .default('config/token_calendar.json'),
    GOOGLE_GMAIL_TOKEN_PATH: z
      .string()
      .trim()
      .min(1)
      .default('config/token_gmail.json'),
    NOTES_FOLDER: z.string().trim().min(1).default('Notes'),
    INTEGRATION_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  })
  .superRefine((env, ctx) => {
    if (
      env.AI_PROVIDER === 'openai' &&
      !env.OPENAI_API_KEY &&
      env.NODE_ENV !== 'test'
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message:
          'OPENAI_API_KEY is required when AI_PROVIDER=openai outside of test environment',
      });
    }
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHUNK_OVERLAP'],
        message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
      });
    }
  });

export type EnvSchema = z.infer<typeof envSchema>;

export const validateEnv = (config: Record<string, unknown>): EnvSchema => {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    const messages = parsed.error.errors
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Configuration validation failed - ${messages}`);
  }
  return parsed.data;
};
