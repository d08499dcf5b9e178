import { z } from 'zod/v4';

const DEFAULT_MIME_TYPES = [
  'image/jpeg',
  'image/png',
  'image/gif',
  'image/webp',
  'application/pdf',
  'text/plain',
];

const envSchema = z.object({
  DATABASE_URL: z.string().optional(),
  JWT_SECRET: z.string().min(1),
  PORT: z.coerce.number().default(3000),
  UPLOAD_DIR: z.string().default('./data/uploads'),
  // Public prefix under which stored files are served
  UPLOAD_BASE_URL: z.string().default('/files'),
  MAX_UPLOAD_SIZE_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  ALLOWED_MIME_TYPES: z
    .string()
    .optional()
    .transform((v) =>
      v
        ? v
            .split(',')
            .map((t) => t.trim())
            .filter((t) => t.length > 0)
        : DEFAULT_MIME_TYPES,
    ),
  // Whole-transaction retries on serialization failure / deadlock
  DB_TX_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  MESSAGE_PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(50),
  ACCESS_TOKEN_TTL: z.string().default('2h'),
});

export type Config = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv): Config {
  return envSchema.parse(env);
}

export const config = loadConfig(process.env);
