import * as os from "os";
import * as path from "path";
import { z } from "zod";
import { getLogger, type LogLevel } from "./logger";

export interface ServerConfig {
  /** A request that waited this long before starting gets its fallback result */
  requestTimeoutMs: number;
  /** In-flight limit for requests of one kind */
  maxSimilarConcurrentWork: number;
  /** In-flight limit across all kinds */
  maxConcurrentWork: number;
  typeDataPath?: string;
  logLevel: LogLevel;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 1500;
const DEFAULT_MAX_SIMILAR_CONCURRENT_WORK = 2;

export const ENV_VARS = {
  requestTimeoutMs: "MINIYAML_LS_REQUEST_TIMEOUT_MS",
  maxSimilarConcurrentWork: "MINIYAML_LS_MAX_SIMILAR_WORK",
  maxConcurrentWork: "MINIYAML_LS_MAX_WORK",
  typeDataPath: "MINIYAML_LS_TYPE_DATA_PATH",
  logLevel: "MINIYAML_LS_LOG_LEVEL",
} as const;

const positiveInt = z.number().int().positive();
const positiveIntFromEnv = z.coerce.number().int().positive();
const nonEmptyString = z.string().min(1);
const logLevel = z.enum(["debug", "info", "warn", "error"]);

const InitOptionsSchema = z.record(z.unknown());

/** Slow-work warnings fire after this many multiples of the request timeout */
export const SLOW_WORK_FACTOR = 5;

function resolveField<T>(
  name: keyof typeof ENV_VARS,
  schema: z.ZodType<T>,
  envSchema: z.ZodType<T>,
  initValue: unknown,
  env: NodeJS.ProcessEnv,
): T | undefined {
  if (initValue !== undefined) {
    const result = schema.safeParse(initValue);
    if (result.success) {
      return result.data;
    }
    getLogger().warn(
      `Ignoring initialization option ${name}=${JSON.stringify(initValue)}: ${result.error.issues[0]?.message}`,
    );
  }

  const envValue = env[ENV_VARS[name]];
  if (envValue !== undefined && envValue !== "") {
    const result = envSchema.safeParse(envValue);
    if (result.success) {
      return result.data;
    }
    getLogger().warn(
      `Ignoring ${ENV_VARS[name]}=${JSON.stringify(envValue)}: ${result.error.issues[0]?.message}`,
    );
  }

  return undefined;
}

/**
 * Resolve the server configuration.
 *
 * Precedence: initialization options, then environment variables, then
 * defaults. Invalid values are logged and skipped.
 */
export function resolveConfig(
  initializationOptions: unknown,
  env: NodeJS.ProcessEnv = process.env,
  workspaceRoot?: string,
): ServerConfig {
  const parsed = InitOptionsSchema.safeParse(initializationOptions);
  const options = parsed.success ? parsed.data : {};

  const typeDataPath =
    resolveField("typeDataPath", nonEmptyString, nonEmptyString, options.typeDataPath, env) ??
    (workspaceRoot ? path.join(workspaceRoot, ".miniyaml", "type-data.json") : undefined);

  return {
    requestTimeoutMs:
      resolveField("requestTimeoutMs", positiveInt, positiveIntFromEnv, options.requestTimeoutMs, env) ??
      DEFAULT_REQUEST_TIMEOUT_MS,
    maxSimilarConcurrentWork:
      resolveField(
        "maxSimilarConcurrentWork",
        positiveInt,
        positiveIntFromEnv,
        options.maxSimilarConcurrentWork,
        env,
      ) ?? DEFAULT_MAX_SIMILAR_CONCURRENT_WORK,
    maxConcurrentWork:
      resolveField("maxConcurrentWork", positiveInt, positiveIntFromEnv, options.maxConcurrentWork, env) ??
      os.availableParallelism(),
    typeDataPath,
    logLevel: resolveField("logLevel", logLevel, logLevel, options.logLevel, env) ?? "info",
  };
}
