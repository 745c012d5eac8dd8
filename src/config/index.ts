import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const ConfigSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  port: z.coerce.number().default(3000),
  host: z.string().default('0.0.0.0'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),

  paths: z.object({
    configDir: z.string().min(1).default('config'),
    dataDir: z.string().min(1).default('data'),
    inboxDir: z.string().min(1).default('inbox'),
  }),

  extraction: z.object({
    quantityWindow: z.coerce.number().int().positive().default(50),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function loadConfig(): Config {
  const result = ConfigSchema.safeParse({
    nodeEnv: process.env.NODE_ENV,
    port: process.env.PORT,
    host: process.env.HOST,
    logLevel: process.env.LOG_LEVEL,

    paths: {
      configDir: process.env.CONFIG_DIR,
      dataDir: process.env.DATA_DIR,
      inboxDir: process.env.INBOX_DIR,
    },

    extraction: {
      quantityWindow: process.env.QUANTITY_WINDOW,
    },
  });

  if (!result.success) {
    console.error('Configuration validation failed:');
    console.error(result.error.format());
    throw new Error('Invalid configuration');
  }

  return result.data;
}

export const config = loadConfig();
