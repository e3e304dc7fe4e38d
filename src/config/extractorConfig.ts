// config/extractorConfig.ts
import dotenv from "dotenv";

dotenv.config();

export const DEFAULT_TIMEOUT_SECONDS = 20;

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 " +
  "(KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

export interface ExtractorConfig {
  timeoutSeconds: number;
  userAgent: string;
  port: number;
  corsOrigins: string[];
}

export const parsePositiveNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export function loadExtractorConfig(env: NodeJS.ProcessEnv = process.env): ExtractorConfig {
  return {
    timeoutSeconds: parsePositiveNumber(env.EXTRACT_TIMEOUT_SECONDS, DEFAULT_TIMEOUT_SECONDS),
    userAgent: env.EXTRACT_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
    port: parsePositiveNumber(env.PORT, 3000),
    corsOrigins: (env.CORS_ORIGINS || "http://localhost:5000")
      .split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
  };
}

export const EXTRACTOR_CONFIG: ExtractorConfig = loadExtractorConfig();
