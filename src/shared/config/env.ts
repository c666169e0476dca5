import { ConfigurationError } from "../../core/errors";
import { pipelineCaps } from "../../application/pipeline/pipeline.config";

export type Env = {
  INGEST_WORK_DIR?: string;
  INGEST_CONCURRENCY?: number;
  INGEST_HTTP_TOKEN?: string;
  MONGO_URI?: string;
  DEBUG: boolean;
};

export const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigurationError(`${name} must be a valid absolute http/https URL. Received: ${value}`, { field: name });
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigurationError(`${name} must use http or https scheme. Received: ${value}`, { field: name });
  }

  return value;
};

export const validateMongoUri = (name: string, value: string): string => {
  if (!/^mongodb(\+srv)?:\/\/\S+$/.test(value)) {
    throw new ConfigurationError(`${name} must be a mongodb:// or mongodb+srv:// connection string`, { field: name });
  }
  return value;
};

export const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new ConfigurationError(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`, { field: name });
  }

  return value;
};

const optionalString = (raw: string | undefined): string | undefined => (raw?.trim() ? raw.trim() : undefined);

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const mongoUri = optionalString(env.MONGO_URI);

  return {
    INGEST_WORK_DIR: optionalString(env.INGEST_WORK_DIR),
    INGEST_CONCURRENCY: parseOptionalIntInRange(env, "INGEST_CONCURRENCY", pipelineCaps.concurrency),
    INGEST_HTTP_TOKEN: optionalString(env.INGEST_HTTP_TOKEN),
    MONGO_URI: mongoUri === undefined ? undefined : validateMongoUri("MONGO_URI", mongoUri),
    DEBUG: isDebugMode(env)
  };
};
