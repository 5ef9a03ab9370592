import { z } from "zod";
import { ConfigError } from "./errors.js";

// Largest delay setTimeout holds without overflowing to 1ms.
export const MAX_TIMEOUT_MS = 2_147_483_647;

const blankAsUnset = (v: unknown) => (v === "" ? undefined : v);

const EnvSchema = z.object({
  PUBLISH_TIMEOUT_SECONDS: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().positive().max(Math.floor(MAX_TIMEOUT_MS / 1000)).default(60)
  ),
  GCP_PROJECT_ID: z.string().optional(),
  GOOGLE_CLOUD_PROJECT: z.string().optional(),
});

export type ServiceConfig = {
  projectId?: string;
  publish: {
    timeoutMs: number;
  };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${parsed.error.message}`, parsed.error.flatten().fieldErrors);
  }
  const e = parsed.data;
  return {
    projectId: e.GCP_PROJECT_ID || e.GOOGLE_CLOUD_PROJECT || undefined,
    publish: {
      timeoutMs: e.PUBLISH_TIMEOUT_SECONDS * 1000,
    },
  };
}

export function checkTimeoutMs(timeoutMs: number): number {
  if (!Number.isInteger(timeoutMs) || timeoutMs < 1 || timeoutMs > MAX_TIMEOUT_MS) {
    throw new ConfigError(`Publish timeout must be an integer between 1 and ${MAX_TIMEOUT_MS} ms, got ${timeoutMs}`, { timeoutMs });
  }
  return timeoutMs;
}
