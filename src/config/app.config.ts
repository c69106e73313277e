// src/config/app.config.ts
// Runtime configuration. Defaults reproduce the container contract: 0.0.0.0:10000.

import path from "path";
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "@/lib/errors/startup.errors";

export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_PORT = 10000;
export const DEFAULT_UPLOAD_LIMIT_BYTES = 20 * 1024 * 1024;

export interface ServerConfig {
  host: string;
  port: number;
}

export interface AppConfig {
  server: ServerConfig;
  corsOrigin: string;
  uploadLimitBytes: number;
  manifestPath: string;
  skipManifestCheck: boolean;
  nodeEnv: string;
}

const BooleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

const EnvSchema = z.object({
  HOST: z.string().trim().min(1).default(DEFAULT_HOST),
  PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  CORS_ORIGIN: z.string().trim().min(1).default("*"),
  UPLOAD_LIMIT_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_UPLOAD_LIMIT_BYTES),
  MANIFEST_PATH: z.string().trim().min(1).default("package.json"),
  SKIP_MANIFEST_CHECK: BooleanFlag,
  NODE_ENV: z.string().default("production"),
});

/**
 * Loads `.env` into `process.env` without overriding variables that are
 * already set. Called once by the entrypoint, never by `loadConfig`.
 */
export function loadDotenv(): void {
  dotenv.config();
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  // Empty strings count as unset so `PORT=` falls back to the default.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }

  const vars = parsed.data;

  return {
    server: { host: vars.HOST, port: vars.PORT },
    corsOrigin: vars.CORS_ORIGIN,
    uploadLimitBytes: vars.UPLOAD_LIMIT_BYTES,
    manifestPath: path.resolve(cwd, vars.MANIFEST_PATH),
    skipManifestCheck: vars.SKIP_MANIFEST_CHECK,
    nodeEnv: vars.NODE_ENV,
  };
}
