import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors";
import { isLogLevel } from "../observability/logger";
import { AppConfig, ConfigOverrides, configFileSchema } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://news.ycombinator.com/",
  userAgent: "hn-frontpage/1.0",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 20_000,
  skipInvalidRecords: false,
  logLevel: "info",
  color: true,
};

export type ConfigEnv = Record<string, string | undefined>;

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, { cause: error });
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigError(`Invalid config file ${absolutePath}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

export function loadConfig(configPath?: string, env: ConfigEnv = process.env): AppConfig {
  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...readConfigFile(configPath),
  };

  const envLogLevel = env.LOG_LEVEL?.trim().toLowerCase();

  return {
    baseUrl: env.BASE_URL || merged.baseUrl,
    userAgent: env.USER_AGENT || merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    skipInvalidRecords: toBool(env.SKIP_INVALID_RECORDS, merged.skipInvalidRecords),
    logLevel: envLogLevel && isLogLevel(envLogLevel) ? envLogLevel : merged.logLevel,
    color: toBool(env.COLOR, merged.color),
  };
}

export { DEFAULT_CONFIG };
