/**
 * Environment configuration, validated once at startup.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { AUTH_CONSTANTS } from "./constants";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export const logLevelSchema = z.enum(LOG_LEVELS);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.string().url().optional(),
  LOG_LEVEL: logLevelSchema.default("info"),
  ALLOWED_EMAIL_DOMAINS: z
    .string()
    .optional()
    .transform((value) =>
      value
        ? value.split(",").map((domain) => domain.trim().toLowerCase()).filter(Boolean)
        : [...AUTH_CONSTANTS.DEFAULT_ALLOWED_EMAIL_DOMAINS],
    ),
});

export type AppEnv = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new Error(`Invalid environment: ${fromZodError(result.error).message}`);
  }
  return result.data;
}
