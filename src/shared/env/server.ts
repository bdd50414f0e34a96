// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for the relay runtime; provides lazy server environment access. Does not read config files.
 * Invariants: All required env vars validated on first access; provides boolean flags for runtime and test modes; fails fast on invalid env.
 * Side-effects: process.env
 * Notes: APP_ENV=test wires in-memory adapters; DATABASE_URL from direct var or component vars.
 *        Numeric limits accept 0 where 0 means "disabled" (history window, message limit).
 * Links: bootstrap/container
 * @public
 */

import { ZodError, z } from "zod";

import { buildDatabaseUrl } from "@/shared/db/db-url";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Application environment (controls adapter wiring)
  APP_ENV: z.enum(["test", "production"]).default("production"),

  // Service identity for observability
  SERVICE_NAME: z.string().default("relay"),

  // Provider
  PROVIDER_DEFAULT_API_KEY: z.string().min(1).optional(),
  DEFAULT_MODEL: z.string().min(1).default("models/gemini-1.5-flash-latest"),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  PROVIDER_CLIENT_CACHE_SIZE: z.coerce.number().int().positive().default(100),

  // Conversation limits (0 disables)
  MAX_HISTORY_LENGTH_TURNS: z.coerce.number().int().min(0).default(20),
  DEFAULT_KEY_MESSAGE_LIMIT: z.coerce.number().int().default(5),
  PENDING_INPUT_TTL_SECONDS: z.coerce.number().int().positive().default(600),

  // Database connection: either provide DATABASE_URL directly OR component pieces
  DATABASE_URL: z.string().url().optional(),
  POSTGRES_USER: z.string().min(1).optional(),
  POSTGRES_PASSWORD: z.string().min(1).optional(),
  POSTGRES_DB: z.string().min(1).optional(),
  DB_HOST: z.string().optional(),
  DB_PORT: z.coerce.number().default(5432),

  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),
});

type ServerEnv = z.infer<typeof serverSchema> & {
  DATABASE_URL: string;
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
  isTestMode: boolean;
};

let ENV: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    try {
      const parsed = serverSchema.parse(process.env);
      const isDev = parsed.NODE_ENV === "development";
      const isTest = parsed.NODE_ENV === "test";
      const isProd = parsed.NODE_ENV === "production";
      const isTestMode = parsed.APP_ENV === "test";

      let DATABASE_URL: string;
      if (parsed.DATABASE_URL) {
        DATABASE_URL = parsed.DATABASE_URL;
      } else {
        if (
          !parsed.POSTGRES_USER ||
          !parsed.POSTGRES_PASSWORD ||
          !parsed.POSTGRES_DB ||
          !parsed.DB_HOST
        ) {
          throw new EnvValidationError({
            code: "INVALID_ENV",
            missing: ["DATABASE_URL"],
            invalid: [],
          });
        }
        DATABASE_URL = buildDatabaseUrl({
          POSTGRES_USER: parsed.POSTGRES_USER,
          POSTGRES_PASSWORD: parsed.POSTGRES_PASSWORD,
          POSTGRES_DB: parsed.POSTGRES_DB,
          DB_HOST: parsed.DB_HOST,
          DB_PORT: parsed.DB_PORT,
        });
      }

      ENV = {
        ...parsed,
        DATABASE_URL,
        isDev,
        isTest,
        isProd,
        isTestMode,
      };
    } catch (error) {
      if (error instanceof ZodError) {
        const missing = new Set<string>();
        const invalid = new Set<string>();

        for (const issue of error.issues) {
          const key = issue.path[0]?.toString();
          if (!key) continue;

          // invalid_type covers both absent and wrongly-typed values
          if (issue.code === "invalid_type") {
            missing.add(key);
          } else {
            invalid.add(key);
          }
        }

        throw new EnvValidationError({
          code: "INVALID_ENV",
          missing: [...missing],
          invalid: [...invalid],
        });
      }

      throw error;
    }
  }
  return ENV;
}

/** Drop the memoized env. Tests use this after editing process.env. */
export function resetServerEnv(): void {
  ENV = null;
}

export type { ServerEnv };
