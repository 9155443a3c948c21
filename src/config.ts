import { AnalysisError, pushErr, type FieldError } from "./errors.js";
import { parseIntCell } from "./io/validation.js";
import { DEFAULT_PROGRESS_INTERVAL } from "./core/impl/vocabularyAnalyzer.js";

export const DEFAULT_KEYWORDS = ["家", "钱", "爱情", "青春", "梦想"];
export const DEFAULT_TOP_N = 50;
export const DEFAULT_SUMMARY_TOP_N = 20;

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];
const LOG_FORMATS = ["json", "pretty"] as const;

export type LogFormat = (typeof LOG_FORMATS)[number];

export interface Config {
  logLevel: string;
  logFormat: LogFormat;
  progressInterval: number;
  segmenterLocale: string;
}

function isLogFormat(v: string): v is LogFormat {
  return LOG_FORMATS.some((f) => f === v);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const errors: FieldError[] = [];

  const logLevel = env.LOG_LEVEL ?? "info";
  if (!LOG_LEVELS.includes(logLevel)) pushErr(errors, "LOG_LEVEL", `must be one of: ${LOG_LEVELS.join(", ")}`);

  const format = env.LOG_FORMAT ?? "json";
  const logFormat: LogFormat = isLogFormat(format) ? format : "json";
  if (!isLogFormat(format)) pushErr(errors, "LOG_FORMAT", "must be one of: json, pretty");

  let progressInterval = DEFAULT_PROGRESS_INTERVAL;
  if (env.PROGRESS_INTERVAL !== undefined) {
    const parsed = parseIntCell(env.PROGRESS_INTERVAL);
    if (parsed === undefined || parsed < 1) pushErr(errors, "PROGRESS_INTERVAL", "must be a positive integer");
    else progressInterval = parsed;
  }

  const segmenterLocale = env.SEGMENTER_LOCALE ?? "zh";
  if (!segmenterLocale.trim()) pushErr(errors, "SEGMENTER_LOCALE", "must be non-empty");

  if (errors.length) {
    throw new AnalysisError("INVALID_ARGUMENT", "invalid configuration", { errors });
  }
  return { logLevel, logFormat, progressInterval, segmenterLocale };
}
