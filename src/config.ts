import dotenv from "dotenv";
import * as path from "node:path";

if (process.env.NODE_ENV !== "production") {
  dotenv.config();
}

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

interface Config {
  port: number;
  nodeEnv: string;
  logLevel: LogLevel;
  batchLimit: number;
  countriesPath: string;
}

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function parseLogLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((l) => l === value);
  return level ?? "info";
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export const config: Config = {
  port: parsePositiveInt(process.env.PORT, 8080),
  nodeEnv: process.env.NODE_ENV || "development",
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  batchLimit: parsePositiveInt(process.env.BATCH_LIMIT, 100),
  countriesPath: process.env.COUNTRIES_PATH
    ? path.resolve(process.cwd(), process.env.COUNTRIES_PATH)
    : path.resolve(__dirname, "..", "data", "countries.csv"),
};
