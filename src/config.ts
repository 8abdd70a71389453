import fs from "node:fs";
import path from "node:path";
import { parse } from "yaml";
import { z } from "zod";
import type { EventType } from "./db/types.js";
import { ConfigError } from "./errors.js";

export type AppConfig = {
  dataDir: string;
  dbPath: string;
  configPath: string | null;
};

export type WebhookConfig = {
  port: number;
  secret: string | null;
  path: string;
};

export type TypePolicy = {
  actions: string[];
  batchSize: number;
  minTokens: number;
  maxTokens: number;
  batchTokenBudget: number;
};

export type DispatchMode = "batch" | "per_event";

export type EngineConfig = {
  types: Record<EventType, TypePolicy>;
  cost: {
    targetHourlyRate: number;
    maxHourlyRate: number;
    maxTotalCost: number | null;
  };
  rateLimit: {
    requestsPerHour: number;
    burst: number;
    initialTokens: number;
  };
  batching: {
    flushIntervalMs: number;
    maxInFlightPerSubject: number | null;
  };
  dispatch: {
    mode: DispatchMode;
    perEventTimeoutMs: number;
    reconcileAfterMs: number;
    command: string[];
  };
  retention: {
    horizonDays: number;
    staleAfterHours: number;
    sweepIntervalMs: number;
  };
  stateCache: {
    ttlMs: number;
  };
};

const typePolicySchema = (actions: string[]) =>
  z
    .object({
      actions: z.array(z.string().min(1)).default(actions),
      batch_size: z.number().int().positive().default(5),
      min_tokens: z.number().int().nonnegative().default(100),
      max_tokens: z.number().int().positive().default(8000),
      batch_token_budget: z.number().int().positive().default(20000)
    })
    .refine((policy) => policy.min_tokens <= policy.max_tokens, {
      message: "min_tokens must not exceed max_tokens"
    })
    .default({});

const configFileSchema = z
  .object({
    types: z
      .object({
        issue: typePolicySchema(["opened", "edited"]),
        pull_request: typePolicySchema(["opened", "synchronize"]),
        discussion: typePolicySchema(["created", "edited"])
      })
      .default({}),
    cost: z
      .object({
        target_hourly_rate: z.number().nonnegative().default(10),
        max_hourly_rate: z.number().positive().default(15),
        max_total_cost: z.number().positive().nullable().default(null)
      })
      .refine((cost) => cost.max_hourly_rate >= cost.target_hourly_rate, {
        message: "max_hourly_rate must be at least target_hourly_rate"
      })
      .default({}),
    rate_limit: z
      .object({
        requests_per_hour: z.number().positive().default(100),
        burst: z.number().int().positive().default(10),
        initial_tokens: z.number().nonnegative().default(0)
      })
      .default({}),
    batching: z
      .object({
        flush_interval_ms: z.number().int().positive().default(30_000),
        max_in_flight_per_subject: z.number().int().positive().nullable().default(null)
      })
      .default({}),
    dispatch: z
      .object({
        mode: z.enum(["batch", "per_event"]).default("batch"),
        per_event_timeout_ms: z.number().int().positive().default(600_000),
        reconcile_after_ms: z.number().int().positive().default(3_600_000),
        command: z.array(z.string().min(1)).default([])
      })
      .default({}),
    retention: z
      .object({
        horizon_days: z.number().positive().default(30),
        stale_after_hours: z.number().positive().default(24),
        sweep_interval_ms: z.number().int().positive().default(3_600_000)
      })
      .default({}),
    state_cache: z
      .object({
        ttl_ms: z.number().int().positive().default(3_600_000)
      })
      .default({})
  })
  .default({});

type ConfigFile = z.infer<typeof configFileSchema>;
type ConfigFilePolicy = ConfigFile["types"]["issue"];

const toTypePolicy = (policy: ConfigFilePolicy): TypePolicy => ({
  actions: policy.actions,
  batchSize: policy.batch_size,
  minTokens: policy.min_tokens,
  maxTokens: policy.max_tokens,
  batchTokenBudget: policy.batch_token_budget
});

const toEngineConfig = (file: ConfigFile): EngineConfig => ({
  types: {
    issue: toTypePolicy(file.types.issue),
    pull_request: toTypePolicy(file.types.pull_request),
    discussion: toTypePolicy(file.types.discussion)
  },
  cost: {
    targetHourlyRate: file.cost.target_hourly_rate,
    maxHourlyRate: file.cost.max_hourly_rate,
    maxTotalCost: file.cost.max_total_cost
  },
  rateLimit: {
    requestsPerHour: file.rate_limit.requests_per_hour,
    burst: file.rate_limit.burst,
    initialTokens: file.rate_limit.initial_tokens
  },
  batching: {
    flushIntervalMs: file.batching.flush_interval_ms,
    maxInFlightPerSubject: file.batching.max_in_flight_per_subject
  },
  dispatch: {
    mode: file.dispatch.mode,
    perEventTimeoutMs: file.dispatch.per_event_timeout_ms,
    reconcileAfterMs: file.dispatch.reconcile_after_ms,
    command: file.dispatch.command
  },
  retention: {
    horizonDays: file.retention.horizon_days,
    staleAfterHours: file.retention.stale_after_hours,
    sweepIntervalMs: file.retention.sweep_interval_ms
  },
  stateCache: {
    ttlMs: file.state_cache.ttl_ms
  }
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseNumberEnv = (name: string, value: string): number => {
  const parsed = Number(value);
  if (!value.trim() || !Number.isFinite(parsed)) {
    throw new ConfigError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
};

const parseCommand = (value: string): string[] => {
  const trimmed = value.trim();
  if (trimmed.startsWith("[")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      throw new ConfigError("TOLLGATE_ENGINE_COMMAND is not valid JSON", { cause: error });
    }
    const items = Array.isArray(parsed)
      ? parsed.filter((item): item is string => typeof item === "string")
      : [];
    if (!Array.isArray(parsed) || items.length !== parsed.length) {
      throw new ConfigError("TOLLGATE_ENGINE_COMMAND must be a JSON array of strings");
    }
    return items;
  }
  return trimmed.split(/\s+/).filter((item) => Boolean(item));
};

const section = (raw: Record<string, unknown>, key: string): Record<string, unknown> => {
  const current = raw[key];
  const next = isRecord(current) ? { ...current } : {};
  raw[key] = next;
  return next;
};

const applyEnvOverrides = (
  input: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): Record<string, unknown> => {
  const raw = { ...input };

  if (env.TOLLGATE_TARGET_HOURLY_RATE) {
    section(raw, "cost").target_hourly_rate = parseNumberEnv(
      "TOLLGATE_TARGET_HOURLY_RATE",
      env.TOLLGATE_TARGET_HOURLY_RATE
    );
  }
  if (env.TOLLGATE_MAX_HOURLY_RATE) {
    section(raw, "cost").max_hourly_rate = parseNumberEnv(
      "TOLLGATE_MAX_HOURLY_RATE",
      env.TOLLGATE_MAX_HOURLY_RATE
    );
  }
  if (env.TOLLGATE_MAX_TOTAL_COST) {
    section(raw, "cost").max_total_cost = parseNumberEnv(
      "TOLLGATE_MAX_TOTAL_COST",
      env.TOLLGATE_MAX_TOTAL_COST
    );
  }
  if (env.TOLLGATE_ENGINE_COMMAND) {
    section(raw, "dispatch").command = parseCommand(env.TOLLGATE_ENGINE_COMMAND);
  }

  return raw;
};

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");

/** Validates a parsed policy document, filling every missing key with its default. */
export const parseEngineConfig = (
  raw: unknown,
  env: NodeJS.ProcessEnv = {}
): EngineConfig => {
  const base = raw === undefined || raw === null ? {} : raw;
  if (!isRecord(base)) {
    throw new ConfigError("Configuration must be a mapping");
  }
  const withEnv = applyEnvOverrides(base, env);
  const result = configFileSchema.safeParse(withEnv);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return toEngineConfig(result.data);
};

export type LoadConfigOptions = {
  /** Fail when the file is missing instead of falling back to defaults. */
  required?: boolean;
  env?: NodeJS.ProcessEnv;
};

export const loadEngineConfig = (
  configPath: string | null,
  options: LoadConfigOptions = {}
): EngineConfig => {
  const env = options.env ?? process.env;
  if (!configPath || !fs.existsSync(configPath)) {
    if (configPath && options.required) {
      throw new ConfigError(`Configuration file not found: ${configPath}`);
    }
    return parseEngineConfig({}, env);
  }

  const content = fs.readFileSync(configPath, "utf8");
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${configPath}; ensure valid YAML`, { cause: error });
  }
  return parseEngineConfig(raw, env);
};

export const getDefaultConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const home = env.HOME ?? ".";
  const dataDir = env.TOLLGATE_DATA_DIR ?? path.join(home, ".config", "tollgate");
  return {
    dataDir,
    dbPath: env.TOLLGATE_DB_PATH ?? path.join(dataDir, "state.db"),
    configPath: env.TOLLGATE_CONFIG ?? path.join(dataDir, "config.yaml")
  };
};

export const getWebhookConfig = (env: NodeJS.ProcessEnv = process.env): WebhookConfig => {
  return {
    port: Number(env.TOLLGATE_WEBHOOK_PORT ?? "8000"),
    secret: env.TOLLGATE_WEBHOOK_SECRET || null,
    path: env.TOLLGATE_WEBHOOK_PATH ?? "/webhook"
  };
};
