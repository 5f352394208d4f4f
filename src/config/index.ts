import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const flag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  MONGODB_URI: z.string().default('mongodb://localhost:27017'),
  DB_NAME: z.string().default('sleep_better'),
  TOGETHER_API_KEY: z.string().optional(),
  TOGETHER_MODEL: z.string().default('meta-llama/Meta-Llama-3.1-70B-Instruct-Turbo'),
  ROUTING_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  ROUTING_HISTORY_WINDOW: z.coerce.number().int().min(0).default(3),
  RESPONDER_HISTORY_WINDOW: z.coerce.number().int().min(0).default(5),
  MAX_SESSIONS: z.coerce.number().int().positive().default(1000),
  ENABLE_PRODUCT_DETAILS: flag,
  ENABLE_REVIEWS: flag,
  ENABLE_ORDERS: flag,
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const problems = parsed.error.errors
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment configuration: ${problems}`);
}

const env = parsed.data;

const config = Object.freeze({
  env: env.NODE_ENV,
  port: env.PORT,
  logLevel: env.LOG_LEVEL,
  mongo: {
    uri: env.MONGODB_URI,
    dbName: env.DB_NAME,
  },
  together: {
    apiKey: env.TOGETHER_API_KEY,
    model: env.TOGETHER_MODEL,
  },
  temperatures: {
    routing: env.ROUTING_TEMPERATURE,
    generation: env.TEMPERATURE,
  },
  history: {
    routingWindow: env.ROUTING_HISTORY_WINDOW,
    responderWindow: env.RESPONDER_HISTORY_WINDOW,
  },
  maxSessions: env.MAX_SESSIONS,
  enabledResponders: {
    product_details: env.ENABLE_PRODUCT_DETAILS,
    reviews: env.ENABLE_REVIEWS,
    orders: env.ENABLE_ORDERS,
  },
  welcomeMessage:
    "Welcome to Sleep Better! I'm Frodo, your personal sleep consultant. How may I assist you today?",
});

export type AppConfig = typeof config;

export default config;
