import { z } from "zod";

import type { EventBusConfig } from "./services/event-bus";

const intFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value) => (value ? Number.parseInt(value, 10) : fallback))
    .pipe(z.number().int().nonnegative());

const envSchema = z
  .object({
    NODE_ENV: z.string().default("development"),
    PORT: intFromEnv(5000),
    STORAGE_DRIVER: z.enum(["postgres", "memory"]).default("postgres"),
    DATABASE_URL: z.string().optional(),
    LOG_LEVEL: z.string().optional(),
    ADMIN_TOKEN: z.string().min(1).optional(),
    EVENT_BUS_DRIVER: z
      .string()
      .default("memory")
      .transform((value) => value.toLowerCase())
      .pipe(z.enum(["memory", "kafka"])),
    KAFKA_BROKERS: z.string().default(""),
    EVENT_BUS_KAFKA_TOPIC: z.string().min(1).default("delivery.events"),
    EVENT_BUS_CLIENT_ID: z.string().min(1).default("delivery-dispatch-api"),
    EVENT_BUS_MAX_RETRIES: intFromEnv(3),
    EVENT_BUS_RETRY_DELAY_MS: intFromEnv(100),
  })
  .refine((env) => env.STORAGE_DRIVER === "memory" || Boolean(env.DATABASE_URL), {
    message: "DATABASE_URL must be set. Did you forget to provision a database?",
    path: ["DATABASE_URL"],
  });

export type AppConfig = {
  env: string;
  port: number;
  storage: { driver: "memory" } | { driver: "postgres"; databaseUrl: string };
  adminToken: string | undefined;
  eventBus: EventBusConfig;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    storage:
      parsed.STORAGE_DRIVER === "postgres" && parsed.DATABASE_URL
        ? { driver: "postgres", databaseUrl: parsed.DATABASE_URL }
        : { driver: "memory" },
    adminToken: parsed.ADMIN_TOKEN,
    eventBus: {
      driver: parsed.EVENT_BUS_DRIVER,
      kafkaBrokers: parsed.KAFKA_BROKERS.split(",")
        .map((entry) => entry.trim())
        .filter(Boolean),
      kafkaTopic: parsed.EVENT_BUS_KAFKA_TOPIC,
      clientId: parsed.EVENT_BUS_CLIENT_ID,
      maxRetries: parsed.EVENT_BUS_MAX_RETRIES,
      retryDelayMs: parsed.EVENT_BUS_RETRY_DELAY_MS,
    },
  };
}
